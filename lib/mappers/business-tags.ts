/**
 * Business-line tagging of expenses
 *
 * Expenses dated before the secondary start date always belong to the primary
 * line. From that date on, a description containing one of the secondary
 * keywords moves the expense to the secondary line.
 */

import { BusinessTagConfig } from '../config';
import { ExpenseTag } from '../zoho/types';

export interface BusinessLine {
  kind: 'primary' | 'secondary';
  name: string;
}

const DATE_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[ T]\d{2}:\d{2}:\d{2})?/;

/**
 * Calendar day of a "yyyy-MM-dd" or "yyyy-MM-dd HH:mm:ss" value
 */
export function parseDay(value: string | null | undefined): string | undefined {
  if (!value) {
    return undefined;
  }
  const match = DATE_PATTERN.exec(value.trim());
  return match ? match[1] : undefined;
}

export class BusinessTagger {
  private readonly startDay: string | undefined;
  private readonly keywords: string[];

  constructor(private readonly config: BusinessTagConfig) {
    this.startDay = parseDay(config.secondaryStartDate);
    this.keywords = config.secondaryKeywords.map(keyword => keyword.toLowerCase()).filter(Boolean);
  }

  determine(date: string | null | undefined, description: string | null | undefined): BusinessLine {
    const primary: BusinessLine = { kind: 'primary', name: this.config.primaryTag };
    const day = parseDay(date);
    if (!day || !this.startDay || day < this.startDay) {
      return primary;
    }

    const text = (description ?? '').toLowerCase();
    if (this.keywords.some(keyword => text.includes(keyword))) {
      return { kind: 'secondary', name: this.config.secondaryTag };
    }
    return primary;
  }

  /**
   * Reporting tag for the line, when the Zoho tag ids are configured
   */
  tagsFor(line: BusinessLine): ExpenseTag[] | undefined {
    const { zohoTagId, zohoPrimaryOptionId, zohoSecondaryOptionId } = this.config;
    if (!zohoTagId || !zohoPrimaryOptionId || !zohoSecondaryOptionId) {
      return undefined;
    }
    return [
      {
        tag_id: zohoTagId,
        tag_option_id: line.kind === 'secondary' ? zohoSecondaryOptionId : zohoPrimaryOptionId,
      },
    ];
  }
}

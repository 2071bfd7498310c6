import { describe, it, expect } from '@jest/globals';
import { BusinessTagger, parseDay } from '@/lib/mappers/business-tags';

const tagger = new BusinessTagger({
  primaryTag: 'Consulting',
  secondaryTag: 'Workshops',
  secondaryStartDate: '2024-01-01',
  secondaryKeywords: ['workshop', 'Venue'],
  zohoTagId: undefined,
  zohoPrimaryOptionId: undefined,
  zohoSecondaryOptionId: undefined,
});

describe('parseDay', () => {
  it('accepts dates with or without a time', () => {
    expect(parseDay('2024-03-05')).toBe('2024-03-05');
    expect(parseDay('2024-03-05 08:15:00')).toBe('2024-03-05');
    expect(parseDay('05/03/2024')).toBeUndefined();
    expect(parseDay(null)).toBeUndefined();
  });
});

describe('BusinessTagger', () => {
  it('keeps everything before the start date on the primary line', () => {
    expect(tagger.determine('2023-12-31', 'Workshop venue')).toEqual({ kind: 'primary', name: 'Consulting' });
  });

  it('moves keyword matches from the start date on to the secondary line', () => {
    expect(tagger.determine('2024-01-01', 'Hotel VENUE hire')).toEqual({ kind: 'secondary', name: 'Workshops' });
  });

  it('keeps other expenses on the primary line', () => {
    expect(tagger.determine('2024-02-01', 'Printer paper').kind).toBe('primary');
    expect(tagger.determine(undefined, 'workshop').kind).toBe('primary');
  });

  it('emits no reporting tag without the Zoho ids', () => {
    expect(tagger.tagsFor({ kind: 'secondary', name: 'Workshops' })).toBeUndefined();
  });
});

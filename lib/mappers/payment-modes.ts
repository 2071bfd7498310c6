import { PaymentMode } from '../zoho/types';
import { ownValue } from './values';

export const DEFAULT_PAYMENT_MODE: PaymentMode = 'cash';

/** Online gateway (lowercased) → payment mode */
export const GATEWAY_PAYMENT_MODES: Readonly<Record<string, PaymentMode>> = {
  stripe: 'credit_card',
  paypal: 'paypal',
  square: 'credit_card',
  wepay: 'bank_transfer',
  '2checkout': 'credit_card',
};

/** Manual payment type (lowercased) → payment mode */
export const TYPE_PAYMENT_MODES: Readonly<Record<string, PaymentMode>> = {
  credit: 'credit_card',
  'credit card': 'credit_card',
  visa: 'credit_card',
  mastercard: 'credit_card',
  amex: 'credit_card',
  discover: 'credit_card',
  check: 'check',
  cheque: 'check',
  cash: 'cash',
  'bank transfer': 'bank_transfer',
  ach: 'bank_transfer',
  paypal: 'paypal',
};

function lookup(table: Readonly<Record<string, PaymentMode>>, key: string | null | undefined): PaymentMode | undefined {
  if (!key) {
    return undefined;
  }
  return ownValue(table, key.trim().toLowerCase());
}

/**
 * Gateway table first, then payment type, then cash
 */
export function paymentModeFor(gateway: string | null | undefined, type: string | null | undefined): PaymentMode {
  return lookup(GATEWAY_PAYMENT_MODES, gateway) ?? lookup(TYPE_PAYMENT_MODES, type) ?? DEFAULT_PAYMENT_MODE;
}

import { FreshBooksPayment } from '../freshbooks/types';
import { PaymentCreateRequest } from '../zoho/types';
import { IdLookup } from './invoices';
import { paymentModeFor } from './payment-modes';
import { isoDate, ownValue, parseMoney, present } from './values';

export interface PaymentMappingTables {
  customerFor: IdLookup;
  invoiceFor: IdLookup;
  /** gateway or type (lowercased), or "default" → deposit account id */
  depositAccounts: Readonly<Record<string, string>>;
  today?: string;
}

export interface PaymentMapping {
  request: PaymentCreateRequest;
  /** Gateway or type that had no deposit account configured */
  unmappedDepositKey?: string;
}

export function paymentLabel(payment: FreshBooksPayment): string {
  return present(payment.note) ?? (present(payment.date) ? `Payment on ${payment.date}` : `Payment ${payment.id}`);
}

/**
 * Deposit account by gateway, then type, then the "default" entry
 */
function depositAccountFor(
  payment: FreshBooksPayment,
  accounts: Readonly<Record<string, string>>
): { accountId?: string; unmapped?: string } {
  let unmapped: string | undefined;
  const gateway = present(payment.gateway);
  if (gateway) {
    const mapped = ownValue(accounts, gateway.toLowerCase());
    if (mapped) {
      return { accountId: mapped };
    }
    unmapped = gateway;
  }
  const type = present(payment.type);
  if (type) {
    const mapped = ownValue(accounts, type.toLowerCase());
    if (mapped) {
      return { accountId: mapped };
    }
    unmapped = unmapped ?? type;
  }
  return { accountId: ownValue(accounts, 'default'), unmapped };
}

/**
 * @returns null when the customer has no destination id or the amount is not positive
 */
export function mapPayment(payment: FreshBooksPayment, tables: PaymentMappingTables): PaymentMapping | null {
  const customerId = tables.customerFor(payment.clientid);
  if (!customerId) {
    return null;
  }
  const amount = parseMoney(payment.amount);
  if (amount === undefined || amount <= 0) {
    return null;
  }

  const invoiceId = tables.invoiceFor(payment.invoiceid);
  const deposit = depositAccountFor(payment, tables.depositAccounts);

  return {
    request: {
      customer_id: customerId,
      payment_mode: paymentModeFor(payment.gateway, payment.type),
      amount,
      date: present(payment.date) ?? tables.today ?? isoDate(new Date()),
      reference_number: present(payment.transactionid) ?? present(payment.orderid),
      description: present(payment.note),
      account_id: deposit.accountId,
      invoices: invoiceId ? [{ invoice_id: invoiceId, amount_applied: amount }] : undefined,
    },
    unmappedDepositKey: deposit.unmapped,
  };
}

/**
 * Natural key of a payment: customer, day, amount to the cent, reference
 */
export function paymentKey(
  customerId: string,
  date: string | null | undefined,
  amount: number,
  reference: string | null | undefined
): string {
  return `${customerId}|${(date ?? '').slice(0, 10)}|${amount.toFixed(2)}|${present(reference) ?? ''}`;
}

/**
 * Customer and vendor mappers
 */

import { FreshBooksClientRecord, FreshBooksExpense, FreshBooksInvoice, FreshBooksVendor } from '../freshbooks/types';
import { Address, ContactCreateRequest, ContactPerson } from '../zoho/types';
import { joinLines, present } from './values';

function personName(first: string | null | undefined, last: string | null | undefined): string {
  return [present(first), present(last)].filter(Boolean).join(' ');
}

function address(fields: {
  street?: string | null;
  street2?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
  country?: string | null;
  phone?: string | null;
}): Address | undefined {
  if (!present(fields.street) && !present(fields.city) && !present(fields.country)) {
    return undefined;
  }
  return {
    address: joinLines(fields.street, fields.street2),
    city: present(fields.city),
    state: present(fields.state),
    zip: present(fields.zip),
    country: present(fields.country),
    phone: present(fields.phone),
  };
}

function primaryPerson(fields: {
  first?: string | null;
  last?: string | null;
  email?: string | null;
  phone?: string | null;
  mobile?: string | null;
}): ContactPerson[] | undefined {
  if (!present(fields.first) && !present(fields.last) && !present(fields.email)) {
    return undefined;
  }
  return [
    {
      first_name: present(fields.first),
      last_name: present(fields.last),
      email: present(fields.email),
      phone: present(fields.phone),
      mobile: present(fields.mobile),
      is_primary_contact: true,
    },
  ];
}

/**
 * Organization, else "first last", else a placeholder carrying the source id
 */
export function customerDisplayName(client: FreshBooksClientRecord): string {
  return present(client.organization) ?? (personName(client.fname, client.lname) || `Unknown Client ${client.id}`);
}

export function mapCustomer(client: FreshBooksClientRecord): ContactCreateRequest {
  return {
    contact_name: customerDisplayName(client),
    company_name: present(client.organization),
    contact_type: 'customer',
    billing_address: address({
      street: client.p_street,
      street2: client.p_street2,
      city: client.p_city,
      state: client.p_province,
      zip: client.p_code,
      country: client.p_country,
    }),
    shipping_address: address({
      street: client.s_street,
      street2: client.s_street2,
      city: client.s_city,
      state: client.s_province,
      zip: client.s_code,
      country: client.s_country,
    }),
    contact_persons: primaryPerson({
      first: client.fname,
      last: client.lname,
      email: client.email,
      phone: client.bus_phone ?? client.home_phone,
      mobile: client.mob_phone,
    }),
    currency_code: present(client.currency_code),
    notes: present(client.note),
    tax_id: present(client.vat_number),
  };
}

/**
 * Minimal customer from the client fields an invoice carries, used when the
 * invoice's client was never migrated (e.g. it is archived).
 *
 * @returns null when the invoice has no name to build a customer from
 */
export function mapCustomerFromInvoice(invoice: FreshBooksInvoice): ContactCreateRequest | null {
  const name = present(invoice.organization) ?? personName(invoice.fname, invoice.lname);
  if (!name) {
    return null;
  }
  return {
    contact_name: name,
    company_name: present(invoice.organization),
    contact_type: 'customer',
    billing_address: address({
      street: invoice.street,
      street2: invoice.street2,
      city: invoice.city,
      state: invoice.province,
      zip: invoice.code,
      country: invoice.country,
    }),
    contact_persons: primaryPerson({ first: invoice.fname, last: invoice.lname }),
    currency_code: present(invoice.currency_code),
    tax_id: present(invoice.vat_number),
  };
}

export function vendorDisplayName(vendor: FreshBooksVendor): string {
  return (
    present(vendor.vendor_name) ??
    (personName(vendor.primary_contact_first_name, vendor.primary_contact_last_name) || `Unknown Vendor ${vendor.id}`)
  );
}

export function mapVendor(vendor: FreshBooksVendor): ContactCreateRequest {
  return {
    contact_name: vendorDisplayName(vendor),
    company_name: present(vendor.vendor_name),
    contact_type: 'vendor',
    billing_address: address({
      street: vendor.street,
      street2: vendor.street2,
      city: vendor.city,
      state: vendor.province,
      zip: vendor.postal_code,
      country: vendor.country,
      phone: vendor.phone,
    }),
    contact_persons: primaryPerson({
      first: vendor.primary_contact_first_name,
      last: vendor.primary_contact_last_name,
      email: vendor.primary_contact_email,
      phone: vendor.phone,
    }),
    currency_code: present(vendor.currency_code),
    notes: present(vendor.note),
    website: present(vendor.website),
    tax_id: present(vendor.tax_id),
  };
}

/**
 * Minimal vendor from the vendor name an expense carries
 *
 * @returns null when the expense names no vendor
 */
export function mapVendorFromExpense(expense: FreshBooksExpense): ContactCreateRequest | null {
  const name = present(expense.vendor);
  if (!name) {
    return null;
  }
  return {
    contact_name: name,
    company_name: name,
    contact_type: 'vendor',
    currency_code: present(expense.amount?.code),
  };
}

export * from './accounts';
export * from './business-tags';
export * from './catalog';
export * from './category-mapping';
export * from './contacts';
export * from './expenses';
export * from './invoices';
export * from './payment-modes';
export * from './payments';
export * from './values';

/**
 * Main schema export file - re-exports all tables from the schema directory
 */

export * from './schema/enums';

export * from './schema/donors';
export * from './schema/children';
export * from './schema/projects';
export * from './schema/sponsorships';
export * from './schema/donations';
export * from './schema/invoices';

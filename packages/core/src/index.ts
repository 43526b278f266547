export * from './types/accounts';
export * from './types/report';
export * from './errors';
export * from './thresholds';
export * from './privileges';
export * from './login-history';
export * from './account-database';
export * from './classifier';
export * from './report-builder';
export * from './table';

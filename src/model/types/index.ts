export * from './blinded';
export * from './keyset';
export * from './proof';
export * from './proof-state';

export * from './config';
export * from './ledger';
export { MintKeyset } from './MintKeyset';
export { Mint } from './Mint';

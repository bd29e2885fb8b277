export * from './ProofLedger';
export * from './MemoryProofLedger';
export * from './FileProofLedger';

export * from './core';
export * from './dleq';
export * from './keys';

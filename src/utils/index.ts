export * from './core';
export { Bytes } from './Bytes';

export * from './algebra';
export * from './cost';
export * from './display';
export * from './errors';
export * from './implicant';
export * from './minimize';
export * from './minterm';
export * from './parse';
export * from './petrick';
export * from './primes';
export * from './qm';

export * from './peripheral';
export * from './motor';
export * from './sensors';
export * from './led';
export * from './button';
export * from './registry';

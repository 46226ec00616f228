export * from './constants';
export * from './base';
export * from './hub-messages';
export * from './port-messages';
export * from './codec';

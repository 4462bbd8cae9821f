export { PACKAGE_NAME, PRIMITIVES } from './constants';
export * from './checks';
export * from './errors';
export * from './types';

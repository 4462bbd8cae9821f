const PACKAGE_NAME = 'argsane';

const PRIMITIVES = ['bigint', 'boolean', 'function', 'integer', 'number', 'object', 'string', 'symbol'] as const;


export { PACKAGE_NAME, PRIMITIVES };

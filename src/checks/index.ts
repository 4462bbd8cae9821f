export { default as assertIterable, isIterable } from './iterable';
export { default as assertRange } from './range';
export { default as assertType } from './type';
export { default as assertValue, sameValueZero } from './value';
export { default as element } from './element';

import type { OneOrMany } from './types';


function isArray<T>(input: OneOrMany<T>): input is readonly T[] {
    return Array.isArray(input);
}


const isNil = (value: unknown): value is null | undefined => {
    return value === null || value === undefined;
};

// Wraps a single item so checks can iterate uniformly
const normalize = <T>(input: OneOrMany<T>): readonly T[] => {
    return isArray(input) ? input : [input];
};

// Reads the prototype's own `constructor` slot, so no getter or inherited lookup runs
const typeOf = (value: unknown): string => {
    if (value === null) {
        return 'null';
    }

    if (typeof value !== 'object') {
        return typeof value;
    }

    let proto: unknown = Object.getPrototypeOf(value);

    if (typeof proto !== 'object' || proto === null) {
        return 'object';
    }

    let ctor: unknown = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;

    if (typeof ctor === 'function') {
        let name: unknown = Object.getOwnPropertyDescriptor(ctor, 'name')?.value;

        if (typeof name === 'string' && name) {
            return name;
        }
    }

    return 'object';
};


export default { isNil, normalize, typeOf };

import type { Placeholders, TypeSpec } from './types';


const PLACEHOLDER_REGEX = /\{(\w+)\}/g;


function isPlainObject(value: object): boolean {
    let proto: unknown = Object.getPrototypeOf(value);

    return proto === null || proto === Object.prototype;
}

// Own data properties only, accessors are named instead of invoked
function property(value: object, key: PropertyKey, seen: Set<object>): string {
    let descriptor = Object.getOwnPropertyDescriptor(value, key);

    if (!descriptor) {
        return 'undefined';
    }

    if ('value' in descriptor) {
        return stringify(descriptor.value, seen);
    }

    return descriptor.set && !descriptor.get ? '[Setter]' : '[Getter]';
}

function stringify(value: unknown, seen: Set<object>): string {
    if (typeof value === 'string') {
        return `'${value}'`;
    }

    if (typeof value === 'bigint') {
        return `${value}n`;
    }

    if (typeof value === 'function') {
        let name: unknown = Object.getOwnPropertyDescriptor(value, 'name')?.value;

        return typeof name === 'string' && name ? `[Function ${name}]` : '[Function]';
    }

    if (typeof value !== 'object' || value === null) {
        return String(value);
    }

    // Tag lookup, unlike `String(value)`, never depends on an inherited `toString`
    let tag = Object.prototype.toString.call(value);

    if (tag === '[object Date]' && value instanceof Date) {
        let time = value.getTime();

        return isNaN(time) ? 'Invalid Date' : new Date(time).toISOString();
    }

    if (seen.has(value)) {
        return '[Circular]';
    }

    let array = Array.isArray(value);

    if (!array && !isPlainObject(value)) {
        return tag;
    }

    seen.add(value);

    let parts: string[] = [];

    if (array) {
        let length: unknown = Object.getOwnPropertyDescriptor(value, 'length')?.value;

        for (let i = 0, n = typeof length === 'number' ? length : 0; i < n; i++) {
            parts.push(property(value, String(i), seen));
        }
    }
    else {
        let keys = Object.keys(value);

        for (let i = 0, n = keys.length; i < n; i++) {
            parts.push(`${keys[i]}: ${property(value, keys[i], seen)}`);
        }
    }

    seen.delete(value);

    if (array) {
        return `[${parts.join(', ')}]`;
    }

    return parts.length ? `{ ${parts.join(', ')} }` : '{}';
}


// Custom template when the caller supplied one, the default text otherwise
const build = (template: string | undefined, fallback: string, placeholders: Placeholders): string => {
    return template === undefined ? fallback : format(template, placeholders);
};

// Replaces `{key}` with the matching placeholder, unknown keys stay as written
const format = (template: string, placeholders: Placeholders): string => {
    return template.replace(PLACEHOLDER_REGEX, (match, key: string) => {
        if (!Object.hasOwn(placeholders, key)) {
            return match;
        }

        let replacement: unknown = Reflect.get(placeholders, key);

        return replacement === undefined ? match : String(replacement);
    });
};

const list = (items: readonly string[]): string => {
    return `[${items.join(', ')}]`;
};

const nameOf = (spec: TypeSpec): string => {
    if (typeof spec === 'string') {
        return spec;
    }

    return spec.name || 'anonymous';
};

// Never throws and never runs a getter of the rendered value
const render = (value: unknown): string => {
    return stringify(value, new Set());
};


export default { build, format, list, nameOf, render };

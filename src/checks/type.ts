import { PRIMITIVES } from '~/constants';
import { ArgumentTypeError, ConfigurationError } from '~/errors';
import message from '~/message';
import utilities from '~/utilities';
import type { Nil, OneOrMany, Resolve, TypeOptions, TypeSpec } from '~/types';


let primitives = new Set<string>(PRIMITIVES);


function matchesOne(value: unknown, spec: TypeSpec): boolean {
    if (typeof spec === 'string') {
        switch (spec) {
            case 'integer':
                return Number.isInteger(value);
            case 'object':
                return typeof value === 'object' && value !== null;
            default:
                return typeof value === spec;
        }
    }

    // Wrapper constructors also admit their primitives
    if (spec === Boolean) {
        return typeof value === 'boolean' || value instanceof Boolean;
    }

    if (spec === Number) {
        return typeof value === 'number' || value instanceof Number;
    }

    if (spec === String) {
        return typeof value === 'string' || value instanceof String;
    }

    return value instanceof spec;
}


const expected = (specs: readonly TypeSpec[]): string => {
    if (specs.length === 1) {
        return `of type ${message.nameOf(specs[0])}`;
    }

    let names: string[] = [];

    for (let i = 0, n = specs.length; i < n; i++) {
        names.push(message.nameOf(specs[i]));
    }

    return `any of ${message.list(names)}`;
};

const matches = (value: unknown, specs: readonly TypeSpec[]): boolean => {
    for (let i = 0, n = specs.length; i < n; i++) {
        if (matchesOne(value, specs[i])) {
            return true;
        }
    }

    return false;
};

const resolve = (option: string, types: OneOrMany<TypeSpec>): readonly TypeSpec[] => {
    let specs = utilities.normalize(types);

    if (specs.length === 0) {
        throw new ConfigurationError(option, `<${option}> has to specify at least one type`);
    }

    for (let i = 0, n = specs.length; i < n; i++) {
        let spec: unknown = specs[i];

        if (typeof spec === 'function' || (typeof spec === 'string' && primitives.has(spec))) {
            continue;
        }

        throw new ConfigurationError(
            option,
            `<${option}> has to contain constructors or any of ${message.list(PRIMITIVES)}, but contains ${message.render(spec)}`
        );
    }

    return specs;
};


/**
 * Throws `ArgumentTypeError` unless `value` is an instance of at least one of `types`.
 *
 * `null` and `undefined` pass when `options.nullable` is set.
 */
function assertType<S extends OneOrMany<TypeSpec>, O extends TypeOptions = TypeOptions>(
    name: string,
    value: unknown,
    types: S,
    options?: O
): asserts value is Resolve<S> | Nil<O> {
    let specs = resolve('types', types);

    if ((options?.nullable && utilities.isNil(value)) || matches(value, specs)) {
        return;
    }

    let expectation = expected(specs),
        type = utilities.typeOf(value);

    throw new ArgumentTypeError(
        name,
        message.build(options?.message, `The parameter <${name}> has to be ${expectation}, but has type ${type}!`, {
            expected: expectation,
            name,
            type,
            value: message.render(value)
        })
    );
}


export default assertType;
export { expected, matches, resolve };

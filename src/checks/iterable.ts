import { ArgumentTypeError, ArgumentValueError, ConfigurationError } from '~/errors';
import message from '~/message';
import utilities from '~/utilities';
import type { Elements, IterableOptions, Nil, TypeSpec } from '~/types';
import { expected, matches, resolve } from './type';


interface Length {
    admits: (length: number) => boolean;
    expected: string;
    exact: boolean;
}


function isIterable(value: unknown): value is Iterable<unknown> {
    if (typeof value === 'string') {
        return true;
    }

    return (
        typeof value === 'object' &&
        value !== null &&
        Symbol.iterator in value &&
        typeof value[Symbol.iterator] === 'function'
    );
}

function length(options: IterableOptions): Length | undefined {
    let { maxLength, minLength, targetLength } = options;

    if (targetLength !== undefined && (minLength !== undefined || maxLength !== undefined)) {
        throw new ConfigurationError(
            'targetLength',
            'if <targetLength> is specified, then neither <minLength> nor <maxLength> must be provided'
        );
    }

    let bounds: [string, number | undefined][] = [
        ['maxLength', maxLength],
        ['minLength', minLength],
        ['targetLength', targetLength]
    ];

    for (let i = 0, n = bounds.length; i < n; i++) {
        let [option, bound] = bounds[i];

        if (bound !== undefined && (!Number.isInteger(bound) || bound < 0)) {
            throw new ConfigurationError(option, `<${option}> has to be a non-negative integer, but is ${message.render(bound)}`);
        }
    }

    if (targetLength !== undefined) {
        return {
            admits: (n) => n === targetLength,
            exact: true,
            expected: String(targetLength)
        };
    }

    if (minLength === undefined && maxLength === undefined) {
        return undefined;
    }

    if (minLength !== undefined && maxLength !== undefined && minLength > maxLength) {
        throw new ConfigurationError(
            'minLength',
            `<minLength> must not be greater than <maxLength>, but ${minLength} > ${maxLength}`
        );
    }

    let parts: string[] = [];

    if (minLength !== undefined) {
        parts.push(`>= ${minLength}`);
    }

    if (maxLength !== undefined) {
        parts.push(`<= ${maxLength}`);
    }

    return {
        admits: (n) => (minLength === undefined || n >= minLength) && (maxLength === undefined || n <= maxLength),
        exact: false,
        expected: parts.join(' and ')
    };
}


/**
 * Throws unless `value` is iterable and both its length and each of its elements
 * satisfy `options`.
 *
 * The value is traversed exactly once, so generators and other one-shot iterators
 * can be checked. Per element, in order: marker elements (`nullableElements`),
 * `elementsType`, then `elementCheck`; the first failure is thrown. Errors thrown
 * by `elementCheck` propagate as they are.
 */
function assertIterable<O extends IterableOptions = IterableOptions>(
    name: string,
    value: unknown,
    options?: O
): asserts value is Iterable<Elements<O>> | Nil<O> {
    let opts: IterableOptions = options || {},
        constraint = length(opts),
        specs: readonly TypeSpec[] | undefined;

    if (opts.elementsType !== undefined) {
        specs = resolve('elementsType', opts.elementsType);
    }

    if (utilities.isNil(value) && opts.nullable) {
        return;
    }

    if (!isIterable(value)) {
        let type = utilities.typeOf(value);

        throw new ArgumentTypeError(
            name,
            message.build(opts.message, `The parameter <${name}> has to be iterable, but has type ${type}!`, {
                expected: 'iterable',
                name,
                type,
                value: message.render(value)
            })
        );
    }

    let elements = Array.from(value);

    if (constraint && !constraint.admits(elements.length)) {
        let n = elements.length;

        throw new ArgumentValueError(
            name,
            message.build(
                opts.message,
                constraint.exact
                    ? `The parameter <${name}> has to be of length ${constraint.expected}, but has ${n} elements!`
                    : `The length of parameter <${name}> has to be ${constraint.expected}, but is ${n}!`,
                {
                    expected: constraint.expected,
                    length: n,
                    name,
                    type: utilities.typeOf(value)
                }
            )
        );
    }

    for (let i = 0, n = elements.length; i < n; i++) {
        let element = elements[i];

        if (utilities.isNil(element)) {
            if (opts.nullableElements) {
                continue;
            }

            let rendered = message.render(element);

            throw new ArgumentValueError(
                name,
                message.build(opts.message, `The element at index ${i} of <${name}> must not be ${rendered}!`, {
                    index: i,
                    name,
                    type: utilities.typeOf(element),
                    value: rendered
                }),
                i
            );
        }

        if (specs && !matches(element, specs)) {
            let expectation = expected(specs),
                type = utilities.typeOf(element);

            throw new ArgumentTypeError(
                name,
                message.build(
                    opts.message,
                    `The element at index ${i} of <${name}> has to be ${expectation}, but has type ${type}!`,
                    {
                        expected: expectation,
                        index: i,
                        name,
                        type,
                        value: message.render(element)
                    }
                ),
                i
            );
        }

        if (opts.elementCheck) {
            opts.elementCheck(element);
        }
    }
}


export default assertIterable;
export { isIterable };

import { ArgumentValueError, ConfigurationError } from '~/errors';
import message from '~/message';
import utilities from '~/utilities';
import type { RangeOptions } from '~/types';


type Comparable = number | bigint;

interface Interval {
    admits: (value: Comparable | null | undefined) => boolean;
    expected: string;
}


const resolve = (options: RangeOptions): Interval => {
    let { maximum, minimum } = options,
        complement = options.complement === true,
        maxInclusive = options.maxInclusive !== false,
        minInclusive = options.minInclusive !== false;

    if (minimum === undefined && maximum === undefined) {
        throw new ConfigurationError('minimum', 'at least one of <minimum> and <maximum> has to be provided');
    }

    if (minimum !== undefined && maximum !== undefined && minimum > maximum) {
        throw new ConfigurationError(
            'minimum',
            `<minimum> must not be greater than <maximum>, but ${message.render(minimum)} > ${message.render(maximum)}`
        );
    }

    // Complement flips each symbol and turns the conjunction into a disjunction
    let parts: string[] = [];

    if (minimum !== undefined) {
        let symbol = complement
            ? (minInclusive ? '<' : '<=')
            : (minInclusive ? '>=' : '>');

        parts.push(`${symbol} ${message.render(minimum)}`);
    }

    if (maximum !== undefined) {
        let symbol = complement
            ? (maxInclusive ? '>' : '>=')
            : (maxInclusive ? '<=' : '<');

        parts.push(`${symbol} ${message.render(maximum)}`);
    }

    return {
        admits: (value) => {
            if (value === null || value === undefined) {
                return options.nullable === true;
            }

            let inside =
                (minimum === undefined || (minInclusive ? value >= minimum : value > minimum)) &&
                (maximum === undefined || (maxInclusive ? value <= maximum : value < maximum));

            return inside !== complement;
        },
        expected: parts.join(complement ? ' or ' : ' and ')
    };
};


/**
 * Throws `ArgumentValueError` unless `value` lies within the interval described
 * by `options`, or outside of it with `complement`.
 *
 * Both bounds are inclusive by default. `null` and `undefined` fail unless
 * `options.nullable` is set, whatever `complement` says. The value is compared
 * with the relational operators as it is, so callers holding an `unknown` run
 * `assertType(name, value, ['number', 'bigint'])` first.
 */
function assertRange(name: string, value: Comparable | null | undefined, options: RangeOptions): void {
    let interval = resolve(options);

    if (interval.admits(value)) {
        return;
    }

    let rendered = message.render(value);

    throw new ArgumentValueError(
        name,
        message.build(options.message, `The parameter <${name}> has to be ${interval.expected}, but is ${rendered}!`, {
            expected: interval.expected,
            name,
            type: utilities.typeOf(value),
            value: rendered
        })
    );
}


export default assertRange;
export { resolve };
export type { Comparable, Interval };

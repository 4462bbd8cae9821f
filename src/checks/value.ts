import { ArgumentValueError, ConfigurationError } from '~/errors';
import message from '~/message';
import utilities from '~/utilities';
import type { EqualityFn, ValueOptions } from '~/types';


interface Membership {
    admits: (value: unknown) => boolean;
    describe: () => string;
}


// SameValueZero, the comparison `Array.prototype.includes` uses
const sameValueZero: EqualityFn = (candidate, value) => {
    return candidate === value || (candidate !== candidate && value !== value);
};


const resolve = (values: unknown, options: ValueOptions = {}): Membership => {
    let complement = options.complement === true,
        equals = options.equals || sameValueZero,
        expanded = options.expand !== false && Array.isArray(values),
        candidates: readonly unknown[] = expanded && Array.isArray(values) ? values : [values];

    if (candidates.length === 0) {
        throw new ConfigurationError('values', '<values> has to contain at least one candidate');
    }

    // Rendered on the failure path only
    let describe = (): string => {
        if (!expanded) {
            return `${complement ? 'different from' : 'equal to'} ${message.render(values)}`;
        }

        let rendered: string[] = [];

        for (let i = 0, n = candidates.length; i < n; i++) {
            rendered.push(message.render(candidates[i]));
        }

        return `${complement ? 'distinct from' : 'any of'} ${message.list(rendered)}`;
    };

    return {
        admits: (value) => {
            if (options.nullable && utilities.isNil(value)) {
                return true;
            }

            let found = false;

            for (let i = 0, n = candidates.length; i < n; i++) {
                if (equals(candidates[i], value)) {
                    found = true;
                    break;
                }
            }

            return found !== complement;
        },
        describe
    };
};


/**
 * Throws `ArgumentValueError` unless `value` equals one of `values`, or, with
 * `complement`, none of them.
 *
 * A single array passed as `values` is a list of candidates unless `expand` is `false`.
 * Errors thrown by `options.equals` propagate as they are.
 */
function assertValue(name: string, value: unknown, values: unknown, options: ValueOptions = {}): void {
    let membership = resolve(values, options);

    if (membership.admits(value)) {
        return;
    }

    let expected = membership.describe(),
        rendered = message.render(value);

    throw new ArgumentValueError(
        name,
        message.build(options.message, `The parameter <${name}> has to be ${expected}, but is ${rendered}!`, {
            expected,
            name,
            type: utilities.typeOf(value),
            value: rendered
        })
    );
}


export default assertValue;
export { resolve, sameValueZero };
export type { Membership };

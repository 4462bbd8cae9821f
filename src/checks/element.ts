import { ArgumentValueError } from '~/errors';
import message from '~/message';
import utilities from '~/utilities';
import type { RangeOptions, ValueOptions } from '~/types';
import { resolve as interval, type Comparable } from './range';
import { resolve as membership } from './value';


function fail(name: string, template: string | undefined, expected: string, element: unknown): never {
    let rendered = message.render(element);

    throw new ArgumentValueError(
        name,
        message.build(template, `The elements of <${name}> have to be ${expected}, but ${rendered} was encountered!`, {
            expected,
            name,
            type: utilities.typeOf(element),
            value: rendered
        })
    );
}


// Both builders validate their options once, when the callback is built

const range = (name: string, options: RangeOptions) => {
    let bounds = interval(options);

    return (element: Comparable | null | undefined): void => {
        if (!bounds.admits(element)) {
            fail(name, options.message, bounds.expected, element);
        }
    };
};

const value = (name: string, values: unknown, options: ValueOptions = {}) => {
    let candidates = membership(values, options);

    return (element: unknown): void => {
        if (!candidates.admits(element)) {
            fail(name, options.message, candidates.describe(), element);
        }
    };
};


export default { range, value };

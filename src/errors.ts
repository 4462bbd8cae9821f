import { PACKAGE_NAME } from './constants';


type ErrorKind = 'configuration' | 'type' | 'value';


/**
 * Base class of everything a check throws on its own account.
 *
 * Errors thrown by caller-supplied callbacks (`equals`, `elementCheck`) are
 * never wrapped and do not extend this class.
 */
abstract class CheckError extends Error {
    abstract readonly kind: ErrorKind;


    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}


/**
 * The options handed to a check are malformed, so the check cannot be evaluated
 */
class ConfigurationError extends CheckError {
    readonly kind = 'configuration' as const;

    readonly option: string;


    constructor(option: string, message: string) {
        super(`${PACKAGE_NAME}: ${message}`);
        this.option = option;
    }
}

class ArgumentTypeError extends CheckError {
    readonly argument: string;

    readonly index: number | undefined;

    readonly kind = 'type' as const;


    constructor(argument: string, message: string, index?: number) {
        super(message);
        this.argument = argument;
        this.index = index;
    }
}

class ArgumentValueError extends CheckError {
    readonly argument: string;

    readonly index: number | undefined;

    readonly kind = 'value' as const;


    constructor(argument: string, message: string, index?: number) {
        super(message);
        this.argument = argument;
        this.index = index;
    }
}


export { ArgumentTypeError, ArgumentValueError, CheckError, ConfigurationError };
export type { ErrorKind };

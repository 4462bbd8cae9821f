import { CheckError } from '../src';


// Runs `fn` and returns what it threw, failing the test when nothing was thrown
function thrown(fn: () => unknown): Error {
    try {
        fn();
    }
    catch (e) {
        if (e instanceof Error) {
            return e;
        }

        throw e;
    }

    throw new Error('expected the call to throw');
}

// `true` when `fn` passes, `false` when it throws a check error
function outcome(fn: () => unknown): boolean {
    try {
        fn();
    }
    catch (e) {
        if (e instanceof CheckError) {
            return false;
        }

        throw e;
    }

    return true;
}


export { outcome, thrown };

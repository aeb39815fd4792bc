import { INPUT_DEFAULTS } from './constants.js';
import { InputError } from './errors.js';
import { isValidPostalCode } from './geocoder.js';
import type { Input } from './types.js';

/** Actor input as stored in INPUT.json; nothing about it is trusted. */
export type RawInput = Partial<Record<keyof Input, unknown>>;

const FLAGS: Record<string, keyof Input> = {
    '--weekends': 'weekendsAhead',
    '--zip': 'postalCode',
    '--max-miles': 'maxMiles',
    '--make': 'make',
    '--model': 'model',
    '--concurrency': 'maxConcurrency',
};

/** `--zip 94103 --weekends 3 -v` → { postalCode: '94103', weekendsAhead: '3', verbose: true } */
export const parseArgs = (argv: string[]): RawInput => {
    const parsed: RawInput = {};
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '-v' || arg === '--verbose') {
            parsed.verbose = true;
            continue;
        }

        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const inlineValue = eq === -1 ? undefined : arg.slice(eq + 1);
        const key = FLAGS[flag];
        if (!key) throw new InputError(`Unknown option: ${arg}`);

        const value = inlineValue ?? argv[++i];
        if (value === undefined) throw new InputError(`Option ${flag} needs a value`);
        parsed[key] = value;
    }
    return parsed;
};

const toInteger = (value: unknown, name: string, { min }: { min: number }): number => {
    const num = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof num !== 'number' || !Number.isInteger(num) || num < min) {
        throw new InputError(`${name} must be an integer of at least ${min}, got ${JSON.stringify(value)}`);
    }
    return num;
};

const toText = (value: unknown, name: string): string => {
    if (typeof value !== 'string' && typeof value !== 'number') {
        throw new InputError(`${name} is required`);
    }
    const text = String(value).trim();
    if (text === '') throw new InputError(`${name} is required`);
    return text;
};

/** Actor input with command-line flags layered on top, checked and filled with defaults. */
export const resolveInput = (raw: RawInput | null, argv: string[] = []): Input => {
    const merged: RawInput = { ...raw, ...parseArgs(argv) };

    const postalCode = toText(merged.postalCode, 'postalCode');
    if (!isValidPostalCode(postalCode)) {
        throw new InputError(`Not a valid US postal code: "${postalCode}"`);
    }

    return {
        weekendsAhead: toInteger(merged.weekendsAhead, 'weekendsAhead', { min: 1 }),
        postalCode,
        maxMiles: toInteger(merged.maxMiles ?? INPUT_DEFAULTS.maxMiles, 'maxMiles', { min: 1 }),
        make: toText(merged.make ?? INPUT_DEFAULTS.make, 'make'),
        model: toText(merged.model ?? INPUT_DEFAULTS.model, 'model'),
        maxConcurrency: toInteger(merged.maxConcurrency ?? INPUT_DEFAULTS.maxConcurrency, 'maxConcurrency', {
            min: 1,
        }),
        verbose: merged.verbose === true || merged.verbose === 'true',
    };
};

import globalMessages from './global-message-names.json';

const NAMES = new Map<number, string>(
    Object.entries(globalMessages).map(([num, name]) => [Number(num), name]),
);

/**
 * Profile name of a well-known global message number, e.g. 20 → "record".
 */
export function globalMessageName(globalMessageNumber: number): string | undefined {
    return NAMES.get(globalMessageNumber);
}

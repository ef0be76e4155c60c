import crypto from 'crypto';

export const TRANSACTION_ID_PREFIX = 'TXN_';
export const TRANSACTION_ID_PATTERN = /^TXN_[1-9]\d{5}$/;

const MIN_TRANSACTION_NUMBER = 100000;
// exclusive
const MAX_TRANSACTION_NUMBER = 1000000;

/** Returns an integer in [min, max). */
export type RandomInt = (min: number, max: number) => number;

// Six random digits; two refunds may share an id.
export function generateTransactionId(randomInt: RandomInt = crypto.randomInt): string {
    return `${TRANSACTION_ID_PREFIX}${randomInt(MIN_TRANSACTION_NUMBER, MAX_TRANSACTION_NUMBER)}`;
}

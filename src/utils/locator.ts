import { randomInt } from 'crypto';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Pickup locator shown on the board: one letter and three digits, e.g. "K042"
 */
export const generateLocator = (): string => {
  const letter = LETTERS[randomInt(LETTERS.length)];
  const digits = randomInt(1000).toString().padStart(3, '0');
  return `${letter}${digits}`;
};

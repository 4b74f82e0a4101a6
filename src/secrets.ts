import crypto from 'crypto';

export const SECRET_LENGTH = 32;
export const SECRET_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export type SecretGenerator = () => string;

/** Секрет прокси: 32 символа [A-Za-z0-9], crypto.randomInt без перекоса по модулю */
export function newSecret(): string {
  let secret = '';
  for (let i = 0; i < SECRET_LENGTH; i++) {
    secret += SECRET_ALPHABET[crypto.randomInt(SECRET_ALPHABET.length)];
  }
  return secret;
}

import argon2 from 'argon2';

import { AppError } from '../errors/app-error.js';

const MIN_PASSWORD_LENGTH = 12;

export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 19_456,
    timeCost: 2,
    parallelism: 1
  });
}

export async function verifyPassword(passwordHash: string, password: string): Promise<boolean> {
  return argon2.verify(passwordHash, password);
}

export function validatePasswordStrength(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new AppError(400, 'AUTH_PASSWORD_WEAK', `Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`);
  }
}

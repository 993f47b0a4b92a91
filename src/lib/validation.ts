import { z } from 'zod';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

export const portSchema = z.number().int().min(MIN_PORT).max(MAX_PORT);

export function isValidPort(value: number): boolean {
  return portSchema.safeParse(value).success;
}

export function assertNever(value: never, message = 'Unexpected value'): never {
  throw new Error(`${message}: ${JSON.stringify(value)}`);
}

import { expect } from 'chai';

export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  expect.fail('Expected function to throw.');
}

import { BigNumber } from './integers';

export function checkEthereumAddress(key: string) {
  if (!process.env[key]?.match(/^0x[a-fA-F0-9]{40}$/)) {
    throw new Error(`${key} is not provided or invalid`);
  }
}

export function checkBytes32(key: string) {
  if (!process.env[key]?.match(/^0x[a-fA-F0-9]{64}$/)) {
    throw new Error(`${key} is not provided or invalid`);
  }
}

export function checkBigNumber(key: string) {
  const value = process.env[key];
  if (!value || new BigNumber(value).isNaN() || !new BigNumber(value).isInteger()) {
    throw new Error(`${key} is not provided or invalid`);
  }
}

export function checkBigNumberAndGreaterThan(key: string, minValue: string) {
  const value = process.env[key];
  if (!value || new BigNumber(value).isNaN() || new BigNumber(value).lte(minValue)) {
    throw new Error(`${key} is not provided or invalid`);
  }
}

export function checkJsNumber(key: string) {
  if (!process.env[key] || Number.isNaN(Number(process.env[key]))) {
    throw new Error(`${key} is not provided or invalid`);
  }
}

export function checkTimestamp(key: string) {
  checkJsNumber(key);
  if (!Number.isInteger(Number(process.env[key])) || Number(process.env[key]) < 0) {
    throw new Error(`${key} must be a whole number of seconds`);
  }
}

export function checkExists(key: string) {
  if (!process.env[key]) {
    throw new Error(`${key} is not provided`);
  }
}

export function checkConditionally(condition: boolean, checker: () => void) {
  if (condition) {
    checker();
  }
}

/**
 * Expects a comma-separated list of `categoryId:durationSeconds` pairs
 */
export function checkCategoryList(key: string, minLength: number) {
  const list = _checkList(key, minLength);

  list.forEach((entry, i) => {
    const [categoryId, duration] = entry.trim().split(':');
    if (
      !categoryId
      || !duration
      || !Number.isInteger(Number(categoryId))
      || !Number.isInteger(Number(duration))
      || Number(duration) < 0
    ) {
      throw new Error(`${key} at index=${i} is invalid`);
    }
  });
}

// =================================================
// =============== Private Functions ===============
// =================================================

function _checkList(key: string, minLength: number): string[] {
  const value = process.env[key];
  if (!value) {
    throw new Error(`${key} is not provided`);
  }
  const list = value.split(',');
  if (list.length < minLength) {
    throw new Error(`${key} length is less than ${minLength}`);
  }

  return list;
}

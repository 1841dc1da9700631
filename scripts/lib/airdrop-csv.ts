import csv from 'csv-parser';
import { ethers } from 'ethers';
import fs from 'fs';
import { normalizeNonZeroAddress } from '../../src/helpers/address-helpers';
import { BigNumber, Integer, INTEGERS } from '../../src/lib/integers';

interface AirdropCsvRow {
  address: string;
  amount: string;
}

/**
 * Reads an `address,amount` CSV where amounts are whole tokens (decimals and thousands separators allowed) and
 * returns wei amounts keyed by lower-cased address. Repeated addresses are summed.
 */
export function readAirdropCsv(filePath: string): Promise<Record<string, Integer>> {
  return new Promise((resolve, reject) => {
    const results: Record<string, Integer> = {};
    fs.createReadStream(filePath)
      .on('error', reject)
      .pipe(csv({ mapHeaders: ({ header }) => header.trim().toLowerCase() }))
      .on('data', (row: AirdropCsvRow) => {
        try {
          const address = normalizeNonZeroAddress(row.address.trim());
          const amount = new BigNumber(ethers.utils.parseUnits(row.amount.replace(/,/g, '').trim()).toString());
          results[address] = (results[address] ?? INTEGERS.ZERO).plus(amount);
        } catch (error) {
          reject(error);
        }
      })
      .on('error', reject)
      .on('end', () => resolve(results));
  });
}

import path from 'path';
import { calculateMerkleRootAndProofs } from '../src/helpers/merkle-helpers';
import Logger from '../src/lib/logger';
import { readAirdropCsv } from './lib/airdrop-csv';
import { writeOutputFile } from './lib/file-helpers';

const DEFAULT_INPUT_PATH = path.join(process.cwd(), 'scripts', 'input', 'airdrop-sample.csv');

async function generateAirdropMerkleRoot() {
  const inputPath = process.argv[2] ? path.resolve(process.argv[2]) : DEFAULT_INPUT_PATH;
  const userToAmounts = await readAirdropCsv(inputPath);
  const { merkleRoot, walletAddressToProofsMap } = calculateMerkleRootAndProofs(userToAmounts);

  const outputPath = writeOutputFile(
    `airdrop/airdrop-${path.basename(inputPath, '.csv')}.json`,
    { merkleRoot, walletAddressToLeavesMap: walletAddressToProofsMap },
    2,
  );

  Logger.info({
    at: 'generate-airdrop-merkle-root',
    message: 'Generated airdrop merkle root',
    merkleRoot,
    users: Object.keys(walletAddressToProofsMap).length,
    outputPath,
  });
}

generateAirdropMerkleRoot()
  .then(() => {
    console.log('Finished executing script!');
  })
  .catch(error => {
    console.error('Caught error while starting:', error);
    process.exit(1);
  });

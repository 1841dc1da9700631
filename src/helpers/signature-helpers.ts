import { ethers } from 'ethers';
import { ClaimDomain, ClaimSchema } from '../contracts/claim-authorization';
import Logger from '../lib/logger';

/**
 * Loads the wallet whose key signs claim requests and checks it resolves to `expectedAddress`
 */
export function loadSignerWallet(privateKey: string, expectedAddress: string): ethers.Wallet {
  const wallet = new ethers.Wallet(privateKey);
  if (wallet.address.toLowerCase() !== expectedAddress.toLowerCase()) {
    Logger.error({
      at: 'signature-helpers#loadSignerWallet',
      message: 'Signer private key does not match the expected address',
      privateKeyResolvesTo: wallet.address.toLowerCase(),
      expectedAddress: expectedAddress.toLowerCase(),
    });
    throw new Error('Signer private key does not match address');
  }

  Logger.info({
    at: 'signature-helpers#loadSignerWallet',
    message: 'Loaded claim signer',
    signerAddress: wallet.address.toLowerCase(),
  });
  return wallet;
}

export function signClaimRequest<R>(
  wallet: ethers.Wallet,
  domain: ClaimDomain,
  schema: ClaimSchema<R>,
  request: R,
): Promise<string> {
  return wallet._signTypedData(domain, schema.types, schema.encode(request));
}

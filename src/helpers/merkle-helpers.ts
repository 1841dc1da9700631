import { ethers } from 'ethers';
import { MerkleTree } from 'merkletreejs';
import { Integer } from '../lib/integers';

export interface MerkleRootAndProofData {
  merkleRoot: string;
  walletAddressToProofsMap: Record<string, AmountAndProof>; // wallet ==> proofs + amounts
}

export interface AmountAndProof {
  amount: string;
  leaf: string;
  proofs: string[];
}

/**
 * `keccak256(abi.encodePacked(address, uint256))`
 */
export function getAirdropLeaf(account: string, amount: Integer): string {
  return ethers.utils.solidityKeccak256(['address', 'uint256'], [account, amount.toFixed(0)]);
}

export function calculateMerkleRootAndProofs(userToAmounts: Record<string, Integer>): MerkleRootAndProofData {
  const walletAddressToFinalDataMap: Record<string, AmountAndProof> = {};
  const leaves: string[] = [];
  Object.keys(userToAmounts).forEach(account => {
    const userAmount = userToAmounts[account];
    const leaf = getAirdropLeaf(account, userAmount);
    walletAddressToFinalDataMap[account.toLowerCase()] = {
      amount: userAmount.toFixed(0),
      leaf,
      proofs: [], // filled in once the tree is built
    };
    leaves.push(leaf);
  });

  const tree = new MerkleTree(leaves, ethers.utils.keccak256, { sort: true });

  Object.values(walletAddressToFinalDataMap).forEach(data => {
    data.proofs = tree.getHexProof(data.leaf);
  });

  return { merkleRoot: tree.getHexRoot(), walletAddressToProofsMap: walletAddressToFinalDataMap };
}

/**
 * Folds `proof` into `leaf` hashing each pair in ascending order, the way a sorted tree is built
 */
export function verifyMerkleProof(proof: string[], leaf: string, root: string): boolean {
  const computed = proof.reduce((node, sibling) => {
    const [first, second] = node.toLowerCase() <= sibling.toLowerCase() ? [node, sibling] : [sibling, node];
    return ethers.utils.keccak256(ethers.utils.concat([first, second]));
  }, leaf);
  return computed.toLowerCase() === root.toLowerCase();
}

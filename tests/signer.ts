import { bytesToHex } from "@stacks/common";
import { hashMessage } from "@stacks/encryption";
import {
  TransactionVersion,
  createStacksPrivateKey,
  getAddressFromPublicKey,
  getPublicKey,
  makeRandomPrivKey,
  privateKeyToString,
  publicKeyToString,
  signMessageHashRsv,
} from "@stacks/transactions";
import { signedMessage, type RequestAuth, type SignedRequest } from "../apps/operator/src/auth";

export interface TestSigner {
  address: string;
  publicKey: string;
  /** Sign `request`, acting for this signer's own address unless `principal` says otherwise. */
  sign(request: Omit<SignedRequest, "principal"> & { principal?: string }, issuedAt?: number): RequestAuth;
}

/** Fresh testnet key pair; the key never leaves the test process. */
export function makeSigner(): TestSigner {
  const raw = privateKeyToString(makeRandomPrivKey());
  const privateKey = createStacksPrivateKey(raw.length === 64 ? `${raw}01` : raw);
  const publicKey = publicKeyToString(getPublicKey(privateKey));
  const address = getAddressFromPublicKey(publicKey, TransactionVersion.Testnet);

  return {
    address,
    publicKey,
    sign(request, issuedAt = Date.now()) {
      const message = signedMessage({ principal: address, ...request }, issuedAt);
      const signature = signMessageHashRsv({ messageHash: bytesToHex(hashMessage(message)), privateKey });
      return { publicKey, signature: signature.data, issuedAt };
    },
  };
}

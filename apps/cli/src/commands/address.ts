import { PrivateKey, PublicKey, addressFromPrivateKey, addressFromPublicKey } from '@ethkey/crypto';

export interface AddressOptions {
  /** Treat the input as a 65-byte public key instead of a private key */
  public?: boolean;
}

export interface AddressResult {
  address: string;
}

export function runAddress(key: string, options: AddressOptions = {}): AddressResult {
  const address = options.public
    ? addressFromPublicKey(PublicKey.fromHex(key))
    : addressFromPrivateKey(PrivateKey.fromHex(key));

  return { address: address.toChecksumString() };
}

export function formatAddress(result: AddressResult): string {
  return result.address;
}

/**
 * @ethkey/crypto - Key Material
 *
 * secp256k1 private and public key value types.
 */

export { PrivateKey } from './private-key';
export { PublicKey } from './public-key';

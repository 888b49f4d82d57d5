/**
 * @ethkey/crypto - Hashing
 */

export { keccak256, keccak512, keccak256Hex, hashMessage } from './keccak';

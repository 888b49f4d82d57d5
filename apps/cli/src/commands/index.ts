export { runKeygen, formatKeygen, type KeygenResult } from './keygen';
export { runAddress, formatAddress, type AddressOptions, type AddressResult } from './address';
export { runHash, formatHash, type HashBits, type HashOptions, type HashResult } from './hash';
export { runSign, formatSign, type SignOptions, type SignResult } from './sign';
export { runVerify, formatVerify, type VerifyOptions, type VerifyResult } from './verify';
export { runRecover, formatRecover, type RecoverResult } from './recover';
export { runChecksum, formatChecksum, type ChecksumResult } from './checksum';

/**
 * warden-jwt - Server SDK
 */

export { Warden } from './warden';
export type { SignOptions, VerifyOptions, ResourceResult } from './warden';

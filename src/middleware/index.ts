/**
 * warden-jwt - Middleware
 */

export * from './constants';
export * from './express';

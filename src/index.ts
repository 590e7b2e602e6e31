/**
 * Multi-account Google OAuth credential manager.
 */

export * from './accounts.js';
export * from './credentials.js';
export * from './errors.js';
export * from './config.js';
export * from './logger.js';
export * from './oauthProvider.js';
export * from './callbackListener.js';
export * from './authorizationFlow.js';
export * from './credentialAccessor.js';
export * from './accountManager.js';
export { FileAccountRegistry } from './fileAccountRegistry.js';
export { FileCredentialStore } from './fileCredentialStore.js';
export { GoogleOAuthProvider, toTokenRejection } from './providers/googleOAuthProvider.js';
export { createApp, type AppOptions } from './app.js';

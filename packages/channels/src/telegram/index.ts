export { TelegramTransport, createTelegramTransport, type TelegramTransportOptions } from './transport.js';
export { FileAuthenticator, type FileAuthenticatorOptions } from './file-auth.js';
export { SessionStore } from './session-store.js';

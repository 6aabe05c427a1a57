export * from './bitwarden/index.js';

/**
 * Fixed application settings.
 * There is no env or CLI configuration — the store file lives in the working directory.
 */
import path from 'node:path';

export const DATA_FILE = path.resolve(process.cwd(), 'despesas.json');

// Loopback only: the API serves the local UI, never the network
export const API_HOST = '127.0.0.1';
export const API_PORT = 8787;

export const CURRENCY_PREFIX = 'R$';

/** Title given to entries saved with a blank title */
export const UNTITLED = 'Untitled';

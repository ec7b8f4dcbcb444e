/**
 * JSON file persistence.
 *
 * The whole collection is one JSON array, rewritten on every save. A file
 * that cannot be read back is moved aside to `<file>.bak` and the ledger
 * starts empty, so a bad file never blocks startup.
 */
import fs from 'node:fs';
import path from 'node:path';
import { DATA_FILE } from '../config.js';
import type { Expense } from '../domain/types.js';
import { decodeStoreFile, encodeExpense } from './migrations.js';

export interface ExpenseStore {
  readonly filePath: string;
  load(): Expense[];
  save(expenses: Expense[]): void;
}

export interface StoreOptions {
  now?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Best effort: a failed rename is logged and otherwise ignored */
function backupCorruptFile(filePath: string, reason: unknown): void {
  const backupPath = `${filePath}.bak`;
  console.warn(`Store file ${filePath} is corrupt (${errorMessage(reason)}), moving it to ${backupPath}`);
  try {
    fs.renameSync(filePath, backupPath);
  } catch (error) {
    console.warn(`Could not back up ${filePath}: ${errorMessage(error)}`);
  }
}

export function createJsonStore(filePath: string = DATA_FILE, options: StoreOptions = {}): ExpenseStore {
  const now = options.now ?? (() => new Date());

  return {
    filePath,

    load(): Expense[] {
      if (!fs.existsSync(filePath)) return [];
      try {
        const text = fs.readFileSync(filePath, 'utf-8');
        return decodeStoreFile(text, now().toISOString());
      } catch (error) {
        backupCorruptFile(filePath, error);
        return [];
      }
    },

    // Write-then-rename so a crash mid-write leaves the previous file intact
    save(expenses: Expense[]): void {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp`;
      fs.writeFileSync(tmpPath, JSON.stringify(expenses.map(encodeExpense), null, 2), 'utf-8');
      fs.renameSync(tmpPath, filePath);
    },
  };
}

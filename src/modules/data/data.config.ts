export const ENV_DATA_USE_TRANSACTIONS = 'DATA_USE_TRANSACTIONS';
export const ENV_DATA_ENSURE_INDEXES = 'DATA_ENSURE_INDEXES';
export const ENV_DATA_SEED_TEST_DATA = 'DATA_SEED_TEST_DATA';

export interface DataConfig {
  /**
   * Run saveChanges inside a driver transaction.
   * Needs a replica set; a standalone server rejects transactions.
   */
  readonly useTransactions: boolean;
  /** Create the unique key index of every record collection on startup. */
  readonly ensureIndexes: boolean;
  /** Load sample records at startup into empty collections. */
  readonly seedTestData: boolean;
}

export const DATA_DEFAULTS: Readonly<DataConfig> = {
  useTransactions: false,
  ensureIndexes: true,
  seedTestData: false,
};

/** Treat common "true"/"false" spellings; anything else keeps the fallback. */
function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return fallback;
}

export function loadDataConfig(
  env: NodeJS.ProcessEnv = process.env,
): DataConfig {
  return {
    useTransactions: parseBool(
      env[ENV_DATA_USE_TRANSACTIONS],
      DATA_DEFAULTS.useTransactions,
    ),
    ensureIndexes: parseBool(
      env[ENV_DATA_ENSURE_INDEXES],
      DATA_DEFAULTS.ensureIndexes,
    ),
    seedTestData: parseBool(
      env[ENV_DATA_SEED_TEST_DATA],
      DATA_DEFAULTS.seedTestData,
    ),
  };
}

/** DI token for the loaded DataConfig. */
export const DATA_CONFIG = 'DATA_CONFIG';

/**
 * Threading Configuration
 * Options for conversation threading and the listing built on top of it
 */

export interface ThreadingConfig {
  threading: {
    suppress_repeated_subjects: boolean;
    merge_sent_folder: boolean;
    verify_invariants: boolean;
  };
  listing: {
    subject_max_length: number;
    relative_date_window_days: number;
  };
}

export const DEFAULT_THREADING_CONFIG: ThreadingConfig = {
  threading: {
    suppress_repeated_subjects: true,
    merge_sent_folder: true,
    verify_invariants: false,
  },
  listing: {
    subject_max_length: 150,
    relative_date_window_days: 7,
  },
};

export interface ThreadingConfigOverrides {
  threading?: Partial<ThreadingConfig['threading']>;
  listing?: Partial<ThreadingConfig['listing']>;
}

/**
 * Get threading config with overrides
 */
export function getThreadingConfig(
  overrides?: ThreadingConfigOverrides
): ThreadingConfig {
  if (!overrides) {
    return DEFAULT_THREADING_CONFIG;
  }

  return {
    threading: {
      ...DEFAULT_THREADING_CONFIG.threading,
      ...(overrides.threading || {}),
    },
    listing: {
      ...DEFAULT_THREADING_CONFIG.listing,
      ...(overrides.listing || {}),
    },
  };
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Load threading config from environment
 */
export function loadThreadingConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ThreadingConfig {
  const defaults = DEFAULT_THREADING_CONFIG;

  return {
    threading: {
      suppress_repeated_subjects:
        env.THREAD_SUPPRESS_REPEATED_SUBJECTS === undefined
          ? defaults.threading.suppress_repeated_subjects
          : env.THREAD_SUPPRESS_REPEATED_SUBJECTS === 'true',
      merge_sent_folder:
        env.THREAD_MERGE_SENT_FOLDER === undefined
          ? defaults.threading.merge_sent_folder
          : env.THREAD_MERGE_SENT_FOLDER === 'true',
      verify_invariants:
        env.THREAD_VERIFY_INVARIANTS === undefined
          ? defaults.threading.verify_invariants
          : env.THREAD_VERIFY_INVARIANTS === 'true',
    },
    listing: {
      subject_max_length: parsePositiveInt(
        env.THREAD_SUBJECT_MAX_LENGTH,
        defaults.listing.subject_max_length
      ),
      relative_date_window_days: parsePositiveInt(
        env.THREAD_RELATIVE_DATE_WINDOW_DAYS,
        defaults.listing.relative_date_window_days
      ),
    },
  };
}

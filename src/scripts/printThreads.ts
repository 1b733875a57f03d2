/**
 * Print Threads Script
 *
 * Reads a JSON dump of envelopes, either an array or
 * `{ "inbox": [...], "sent": [...] }`, and prints the threaded listing.
 *
 * Usage: npm run print-threads -- <file> [--conversations] [--mailbox <name>]
 *   [--sort <field[:order]>] [--subsort <field[:order]>] [--filter <term>]
 */

import { promises as fs } from 'fs';
import logger from '../utils/logger';
import { loadThreadingConfigFromEnv } from '../config/threading';
import { InputError, ValidationError, wrapError } from '../errors';
import {
  ThreadBuilder,
  formatThreadRows,
  listConversations,
  listThreadRows,
  parseEnvelopes,
  parseListingSort,
} from '../threading';
import { ListingOptions } from '../threading/ConversationListing';
import { Envelope } from '../threading/types';

interface CliOptions {
  file?: string;
  conversations?: boolean;
  mailbox?: string;
  sort?: string;
  subsort?: string;
  filter?: string;
}

interface EnvelopeDump {
  inbox: Envelope[];
  sent: Envelope[] | null;
}

function parseArgs(): CliOptions {
  const args = process.argv.slice(2);
  const options: CliOptions = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--conversations') {
      options.conversations = true;
    } else if (args[i] === '--mailbox' && args[i + 1]) {
      options.mailbox = args[++i];
    } else if (args[i] === '--sort' && args[i + 1]) {
      options.sort = args[++i];
    } else if (args[i] === '--subsort' && args[i + 1]) {
      options.subsort = args[++i];
    } else if (args[i] === '--filter' && args[i + 1]) {
      options.filter = args[++i];
    } else if (!options.file) {
      options.file = args[i];
    }
  }
  return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseDump(raw: unknown): EnvelopeDump {
  if (isRecord(raw) && 'inbox' in raw) {
    return {
      inbox: parseEnvelopes(raw.inbox),
      sent: raw.sent === undefined || raw.sent === null ? null : parseEnvelopes(raw.sent),
    };
  }
  return { inbox: parseEnvelopes(raw), sent: null };
}

async function loadDump(filePath: string): Promise<EnvelopeDump> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw InputError.notFound(filePath);
    }
    throw InputError.unreadable(filePath, error instanceof Error ? error : undefined);
  }
  return parseDump(JSON.parse(raw));
}

async function printThreads(options: CliOptions): Promise<void> {
  if (!options.file) {
    throw ValidationError.missingField('file');
  }

  const settings = loadThreadingConfigFromEnv();
  const listing: ListingOptions = {
    ...settings.listing,
    sort: options.sort === undefined ? undefined : parseListingSort(options.sort, 'sort'),
    subsort: options.subsort === undefined ? undefined : parseListingSort(options.subsort, 'subsort'),
    filter: options.filter,
  };
  const dump = await loadDump(options.file);

  const builder = new ThreadBuilder({ ...settings.threading, mailbox: options.mailbox });
  const forest = builder.build(dump.inbox, dump.sent);

  const lines = options.conversations
    ? listConversations(forest, listing).map((row) => `${row.subject}  [${row.date_label}]`)
    : formatThreadRows(listThreadRows(forest, listing));

  process.stdout.write(`${lines.join('\n')}\n`);
  logger.info('Printed threads', { ...builder.getLastStats() });
}

export async function main(optionsOverride?: CliOptions) {
  const options = optionsOverride ?? parseArgs();
  await printThreads(options);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    const domainError = wrapError(error);
    logger.error('Failed to print threads', domainError.toJSON());
    process.exit(1);
  });
}

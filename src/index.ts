#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { createAppContext } from './context.js';
import { isServiceError } from './errors.js';
import { fetchAndIngest, ingestPassage } from './ingest/pipeline.js';
import { buildIngestionSummary } from './ingest/summary.js';
import { healthStatus } from './observability.js';
import { topDefinitions } from './retrieval/dictionary.js';
import { warmRankingCache } from './retrieval/rankingCache.js';
import { searchPassages } from './retrieval/search.js';

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    if (args[i].startsWith('--') && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      flags[args[i].slice(2)] = args[i + 1];
      i += 2;
    } else {
      positional.push(args[i]);
      i++;
    }
  }
  return { positional, flags };
}

function usage(): void {
  console.log('Usage:');
  console.log('  wordpulse fetch');
  console.log('  wordpulse ingest "<text>"');
  console.log('  wordpulse search <word...> [--operator and|or]');
  console.log('  wordpulse dictionary [--top <n>]');
  console.log('  wordpulse warm');
  console.log('  wordpulse status');
}

async function main() {
  const rawArgs = process.argv.slice(2);
  const cmd = rawArgs[0];
  const rest = rawArgs.slice(1);

  if (!cmd || cmd === 'help' || cmd === '--help') {
    usage();
    return;
  }

  const ctx = createAppContext(loadConfig());

  if (cmd === 'fetch') {
    const result = await fetchAndIngest(ctx);
    console.log(buildIngestionSummary(result));
    return;
  }

  if (cmd === 'ingest') {
    const text = rest.join(' ');
    if (!text.trim()) {
      console.error('Error: Text required.\nUsage: wordpulse ingest "<text>"');
      process.exit(1);
    }
    const result = await ingestPassage(ctx, text);
    console.log(buildIngestionSummary(result));
    return;
  }

  if (cmd === 'search') {
    const { positional, flags } = parseFlags(rest);
    const { passages, total } = await searchPassages(ctx, positional, flags.operator ?? 'and');
    if (!passages.length) {
      console.log('No matching passages.');
      return;
    }
    console.log(`Showing ${passages.length} of ${total} matching passages:\n`);
    for (const p of passages) {
      console.log(`#${p.id} (${p.createdAt})`);
      console.log(`  ${p.content.replace(/\s+/g, ' ').trim()}\n`);
    }
    return;
  }

  if (cmd === 'dictionary') {
    const { flags } = parseFlags(rest);
    const n = flags.top === undefined ? ctx.config.defaultTopN : Number(flags.top);
    const definitions = await topDefinitions(ctx, n);
    const maxWord = Math.max(4, ...definitions.map((d) => d.word.length));
    console.log(`  ${'Word'.padEnd(maxWord)}  Count  Definition`);
    console.log(`  ${'─'.repeat(maxWord)}  ─────  ──────────`);
    for (const d of definitions) {
      console.log(`  ${d.word.padEnd(maxWord)}  ${String(d.frequency).padStart(5)}  ${d.definition}`);
    }
    return;
  }

  if (cmd === 'warm') {
    const rows = await warmRankingCache(ctx);
    console.log(`Ranking cache holds ${rows} words`);
    return;
  }

  if (cmd === 'status') {
    const health = await healthStatus(ctx);
    console.log(JSON.stringify(health, null, 2));
    if (health.status === 'unhealthy') process.exitCode = 1;
    return;
  }

  usage();
  process.exitCode = 1;
}

main().catch((err) => {
  if (isServiceError(err)) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exit(1);
});

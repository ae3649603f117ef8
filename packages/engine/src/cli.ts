#!/usr/bin/env node
// Valuation disclosure Q&A: command-line interface
//
// Usage:
//   vqa ask "게임 업계 유사기업"              # answer one question
//   vqa ask -i                              # interactive REPL (keeps a conversation log)
//   vqa sectors                             # list issuer sectors in the store
//   vqa migrate                             # apply db/migrations (postgres backend)
//   vqa health                              # check the report store is reachable
//   vqa --help                              # usage

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { KeywordCatalog } from '../config/keyword-catalog.js';
import { createReportRepository, getBackend } from '../config/database.js';
import { closePool, healthCheck, runMigrations } from '../db/pg-client.js';
import type { ReportRepository } from '../db/report-repository.js';
import { ConversationLog } from '../utils/conversation-log.js';
import { createQuestionAnswerer } from './pipeline.js';
import type { QuestionAnswerer } from './pipeline.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const DEFAULT_HISTORY_LIMIT = 10;

// ── CLI class ───────────────────────────────────────────────────────

class VqaCli {
  private repository: ReportRepository | null = null;

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    try {
      switch (command) {
        case 'ask':
          await this.handleAsk(rest);
          break;
        case 'sectors':
          await this.listSectors();
          break;
        case 'migrate':
          await this.migrate();
          break;
        case 'health':
          await this.health();
          break;
        case 'help':
          this.printHelp();
          break;
        default:
          console.error(`Unknown command: ${command}\n`);
          this.printHelp();
          process.exitCode = 1;
      }
    } finally {
      await this.shutdown();
    }
  }

  // ── Wiring ──────────────────────────────────────────────────────

  private async getRepository(): Promise<ReportRepository> {
    if (!this.repository) {
      this.repository = await createReportRepository();
    }
    return this.repository;
  }

  private async createAnswerer(log?: ConversationLog): Promise<QuestionAnswerer> {
    const catalog = KeywordCatalog.load();
    for (const warning of catalog.warnings) {
      console.error(`  ${c('yellow', 'Warning:')} ${warning}`);
    }
    return createQuestionAnswerer(catalog, await this.getRepository(), {
      log,
      onStatus: (stage, message) => {
        if (process.env.VQA_VERBOSE) {
          process.stderr.write(`  ${c('magenta', `[${stage}]`)} ${c('dim', message)}\n`);
        }
      },
    });
  }

  private async shutdown(): Promise<void> {
    if (getBackend() === 'postgres') await closePool();
  }

  // ── Subcommand: ask ─────────────────────────────────────────────

  private async handleAsk(args: string[]): Promise<void> {
    if (args.includes('--help') || args.includes('-h')) {
      this.printHelp();
      return;
    }
    if (args.includes('-i') || args.includes('--interactive')) {
      await this.startRepl();
      return;
    }

    const question = args.join(' ').trim();
    if (!question) {
      console.error('Error: No question provided. Use "vqa --help" for usage.\n');
      process.exitCode = 1;
      return;
    }

    const answerer = await this.createAnswerer();
    await this.askOnce(answerer, question);
  }

  private async askOnce(answerer: QuestionAnswerer, question: string): Promise<void> {
    const result = await answerer.answer(question);
    console.log(`\n${result.text}\n`);
    console.log(
      `  ${c('green', '✓')} ${c('bold', result.intent.type)} ` +
      c('dim', `(${result.rows.length} rows, ${result.timings.totalMs}ms)`) + '\n',
    );
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(): Promise<void> {
    const log = new ConversationLog();
    const answerer = await this.createAnswerer(log);

    console.log(`\n  ${c('bold', 'Valuation Q&A')} ${c('dim', `(backend: ${getBackend()})`)}`);
    console.log(`  ${c('dim', 'Type a question, or /help for commands.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'vqa>')} `,
    });

    const handleLine = async (input: string): Promise<void> => {
      if (input === '/help') {
        this.printReplHelp();
        return;
      }
      if (input === '/history' || input.startsWith('/history ')) {
        const limit = Number(input.slice('/history'.length).trim()) || DEFAULT_HISTORY_LIMIT;
        if (log.size === 0) {
          console.log(`  ${c('dim', '(empty)')}\n`);
          return;
        }
        console.log(`  ${c('dim', `${log.size} questions this session`)}`);
        for (const entry of log.latest(limit)) {
          console.log(`  ${c('dim', entry.timestamp.toISOString())} ${c('cyan', entry.intent)} ${entry.question}`);
        }
        console.log();
        return;
      }
      if (input === '/clear') {
        console.clear();
        return;
      }
      await this.askOnce(answerer, input);
    };

    const done = new Promise<void>(resolve => rl.on('close', () => resolve()));

    rl.prompt();
    rl.on('line', (line: string) => {
      const input = line.trim();
      if (input === 'exit' || input === 'quit') {
        console.log(`  ${c('dim', 'Goodbye.')}\n`);
        rl.close();
        return;
      }
      if (!input) {
        rl.prompt();
        return;
      }
      handleLine(input)
        .catch((err: unknown) => {
          console.error(`  ${c('red', 'Error:')} ${errorMessage(err)}\n`);
        })
        .finally(() => rl.prompt());
    });

    rl.on('SIGINT', () => {
      console.log(`\n  ${c('dim', 'Goodbye.')}\n`);
      rl.close();
    });

    await done;
  }

  // ── Subcommand: sectors ─────────────────────────────────────────

  private async listSectors(): Promise<void> {
    const sectors = await (await this.getRepository()).listSectors();
    console.log(`\n  ${c('bold', `${sectors.length} sectors:`)}\n`);
    for (const sector of sectors) {
      console.log(`    ${c('dim', '●')} ${sector}`);
    }
    console.log();
  }

  // ── Subcommand: migrate ─────────────────────────────────────────

  private async migrate(): Promise<void> {
    if (getBackend() !== 'postgres') {
      console.error(`  ${c('yellow', 'Skipped:')} migrations apply to the postgres backend (VQA_DATA_BACKEND=postgres)\n`);
      return;
    }
    const ran = await runMigrations();
    if (ran.length === 0) {
      console.log(`  ${c('green', '✓')} Schema up to date\n`);
    } else {
      console.log(`  ${c('green', '✓')} Applied: ${ran.join(', ')}\n`);
    }
  }

  // ── Subcommand: health ──────────────────────────────────────────

  private async health(): Promise<void> {
    const backend = getBackend();
    if (backend === 'postgres') {
      if (await healthCheck()) {
        console.log(`  ${c('green', '✓')} postgres reachable\n`);
      } else {
        console.error(`  ${c('red', '✗')} postgres unreachable\n`);
        process.exitCode = 1;
      }
      return;
    }
    const rows = await (await this.getRepository()).loadAll();
    console.log(`  ${c('green', '✓')} local store: ${rows.length} reports\n`);
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Valuation Q&A')}: questions over valuation disclosure reports

  ${c('bold', 'Usage:')}
    vqa ask "<question>"            Answer one question
    vqa ask -i                      Start interactive REPL
    vqa sectors                     List issuer sectors
    vqa migrate                     Apply database migrations (postgres)
    vqa health                      Check the report store is reachable
    vqa --help                      Show this help

  ${c('bold', 'Environment:')}
    VQA_DATA_BACKEND                local (default) or postgres
    VQA_LOCAL_DATA_PATH             JSON report records for the local backend
    VQA_KEYWORDS_PATH               Business keyword catalog (JSON)
    VQA_INDUSTRIES_PATH             Similar-industry catalog (JSON)
    VQA_VERBOSE                     Print pipeline stages to stderr
    PG_HOST, PG_PORT, PG_USER, PG_PASSWORD, PG_DATABASE

  ${c('bold', 'Examples:')}
    vqa ask "게임 업계 유사기업"
    vqa ask "금융업 기업들의 EV/Sales 2022년 이후"
    vqa ask "WACC Top 5"
    vqa ask "2024년 IT 섹터 평균 WACC"
`);
  }

  private printReplHelp(): void {
    console.log(`
  ${c('bold', 'REPL commands:')}
    /help              Show this help
    /history [n]       Show the last n questions (default 10)
    /clear             Clear screen
    exit               Exit REPL
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new VqaCli();
cli.start().catch((err) => {
  console.error(`${c('red', 'Fatal:')} ${errorMessage(err)}`);
  process.exit(1);
});

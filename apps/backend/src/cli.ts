#!/usr/bin/env node
import dotenv from 'dotenv';
import fs from 'fs/promises';
import type { ArtifactMode } from './config/pipelineConfig';
import { loadPipelineConfig } from './config/pipelineConfig';
import type { TradePipeline } from './engines/TradePipeline';
import { errorMessage, NotFoundError, UsageError } from './errors/pipelineErrors';
import { createTradeServices } from './services/pipelineFactory';
import { cleanTradeLog } from './services/TradeLogCleaner';
import { DEFAULT_SEARCH_LIMIT, type TradeStore } from './services/TradeStore';
import { logger } from './utils/logger';

export const USAGE = [
    'Usage:',
    '  trade-journal extract <image|folder> [--batch] [--send-email] [--json-only|--jsonl-only]',
    '  trade-journal search [query] [--limit n]',
    '  trade-journal stats',
    '  trade-journal clean',
].join('\n');

export type CliCommand =
    | {
        kind: 'extract';
        target: string;
        batch: boolean;
        sendNotification: boolean;
        artifactMode?: ArtifactMode;
    }
    | { kind: 'search'; query: string; limit: number }
    | { kind: 'stats' }
    | { kind: 'clean' }
    | { kind: 'help' };

export interface CliServices {
    pipeline: TradePipeline;
    store: TradeStore;
}

function parseLimit(raw: string | undefined): number {
    const parsed = Number(raw);
    if (raw === undefined || !Number.isInteger(parsed) || parsed < 1) {
        throw new UsageError(`--limit expects a positive integer, received "${raw ?? ''}"`);
    }
    return parsed;
}

function parseExtract(args: string[]): CliCommand {
    let target: string | undefined;
    let batch = false;
    let sendNotification = false;
    let artifactMode: ArtifactMode | undefined;

    for (const arg of args) {
        switch (arg) {
            case '--batch':
                batch = true;
                break;
            case '--send-email':
                sendNotification = true;
                break;
            case '--json-only':
            case '--jsonl-only': {
                const mode = arg === '--json-only' ? 'json' : 'jsonl';
                if (artifactMode && artifactMode !== mode) {
                    throw new UsageError('--json-only and --jsonl-only cannot be combined');
                }
                artifactMode = mode;
                break;
            }
            default:
                if (arg.startsWith('--')) {
                    throw new UsageError(`Unknown option for extract: ${arg}`);
                }
                if (target !== undefined) {
                    throw new UsageError(`extract takes one path, received "${target}" and "${arg}"`);
                }
                target = arg;
        }
    }

    if (target === undefined) {
        throw new UsageError('extract needs an image or folder path');
    }
    return { kind: 'extract', target, batch, sendNotification, artifactMode };
}

function parseSearch(args: string[]): CliCommand {
    const terms: string[] = [];
    let limit = DEFAULT_SEARCH_LIMIT;

    for (let i = 0; i < args.length; i += 1) {
        const arg = args[i] ?? '';
        if (arg === '--limit') {
            i += 1;
            limit = parseLimit(args[i]);
        } else if (arg.startsWith('--')) {
            throw new UsageError(`Unknown option for search: ${arg}`);
        } else {
            terms.push(arg);
        }
    }
    return { kind: 'search', query: terms.join(' '), limit };
}

function assertNoArguments(command: string, rest: string[]): void {
    if (rest.length > 0) {
        throw new UsageError(`${command} takes no arguments`);
    }
}

export function parseCliArgs(args: string[]): CliCommand {
    const [command, ...rest] = args;
    switch (command) {
        case 'extract':
            return parseExtract(rest);
        case 'search':
            return parseSearch(rest);
        case 'stats':
            assertNoArguments(command, rest);
            return { kind: 'stats' };
        case 'clean':
            assertNoArguments(command, rest);
            return { kind: 'clean' };
        case undefined:
        case 'help':
        case '--help':
        case '-h':
            return { kind: 'help' };
        default:
            throw new UsageError(`Unknown command: ${command}`);
    }
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch (error) {
        throw new NotFoundError(target, `Path not found: ${target} (${errorMessage(error)})`);
    }
}

/** Runs one parsed command and returns the process exit code. */
export async function runCliCommand(
    command: CliCommand,
    services: CliServices,
    write: (text: string) => void,
): Promise<number> {
    const print = (value: unknown) => write(`${JSON.stringify(value, null, 2)}\n`);

    switch (command.kind) {
        case 'help':
            write(`${USAGE}\n`);
            return 0;
        case 'extract': {
            if (command.batch || await isDirectory(command.target)) {
                const result = await services.pipeline.processBatch(command.target, command.sendNotification);
                print(result);
                return result.total > 0 && result.ok === 0 ? 1 : 0;
            }
            print(await services.pipeline.process(command.target, command.sendNotification));
            return 0;
        }
        case 'search':
            print(await services.store.search(command.query, command.limit));
            return 0;
        case 'stats':
            print(await services.store.computeStatistics());
            return 0;
        case 'clean': {
            const result = await cleanTradeLog(services.store);
            write(`Cleaned ${result.cleaned} trades (${result.skipped} corrupt lines skipped) in ${services.store.getPath()}\n`);
            return 0;
        }
    }
}

async function main(): Promise<void> {
    dotenv.config();
    const command = parseCliArgs(process.argv.slice(2));
    if (command.kind === 'help') {
        process.stdout.write(`${USAGE}\n`);
        return;
    }
    const config = loadPipelineConfig();
    const services = createTradeServices(config, {
        artifactMode: command.kind === 'extract' ? command.artifactMode : undefined,
    });
    await services.store.init();
    process.exitCode = await runCliCommand(command, services, (text) => process.stdout.write(text));
}

if (require.main === module) {
    main().catch((error) => {
        logger.error(`[CLI] ${errorMessage(error)}`);
        if (error instanceof UsageError) {
            process.stderr.write(`${USAGE}\n`);
        }
        process.exitCode = 1;
    });
}

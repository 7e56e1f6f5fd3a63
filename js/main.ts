#!/usr/bin/env node
/**
 * @fileoverview Main Entry Point / CLI
 * Command-line front end over the costing engine. Every command loads the
 * dataset file, runs one operation against an in-memory store, and writes
 * the dataset back when the operation changed it.
 *
 * ## Command Flow
 *
 * ```
 * ┌────────────────────────────────────────────────────────────────┐
 * │  loadConfig() ──► configure logger ──► initErrorReporting()    │
 * └────────────────────────────────────────────────────────────────┘
 *                                 │
 *                                 ▼
 * ┌────────────────────────────────────────────────────────────────┐
 * │  loadDataset(--data) ──► new MemoryStore(dataset)              │
 * └────────────────────────────────────────────────────────────────┘
 *                                 │
 *                                 ▼
 * ┌────────────────────────────────────────────────────────────────┐
 * │  drain / enqueue / recompute   ──► saveDataset()               │
 * │  validate-plan / timeline / plan / check-calendar / export     │
 * └────────────────────────────────────────────────────────────────┘
 *                                 │
 *                                 ▼
 * ┌────────────────────────────────────────────────────────────────┐
 * │  flushErrorReports() ──► exit code                             │
 * └────────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Commands
 * - `drain` - Recompute queued tasks until the queue is empty
 * - `enqueue` - Queue tasks by timer date range and job number prefix
 * - `recompute` - Recompute one or all tasks directly, stoppable via `stop`
 * - `stop` - Ask a running `recompute` or `drain` to stop between tasks
 * - `validate-plan` - Check a planned bar against a machine calendar
 * - `timeline` / `plan` - Print a machine's timeline or plan as JSON
 * - `check-calendar` - Validate a calendar definition file
 * - `export` - Write cost snapshots to CSV
 */

import { readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { DateTime } from 'luxon';
import { recomputeTaskCostSnapshot, type RecomputeDeps } from './calc.js';
import { resolveMachineCalendar, validateCalendarDefinition } from './calendar.js';
import { validatePlanInterval } from './calendar-validator.js';
import { CancellationSource, anyToken, stopFileToken } from './cancellation.js';
import { loadConfig, type CostingConfig } from './config.js';
import { loadDataset, saveDataset } from './dataset.js';
import { enqueueJobCosts } from './enqueue.js';
import { flushErrorReports, initErrorReporting, reportError } from './error-reporting.js';
import { writeSnapshotCsv, type SnapshotExportRow } from './export.js';
import { createLogger, setLogLevel } from './logger.js';
import { buildMachinePlan } from './plan.js';
import { MemoryStore } from './state.js';
import { buildMachineTimeline, resolveWindow } from './timeline.js';
import type { EpochMs } from './types.js';
import { createValidationError, describeError, isFriendlyError, toError, validateEpoch } from './utils.js';
import { drainQueue, recomputeTasks } from './worker-manager.js';

const logger = createLogger('Main');

// ==================== OPTION PARSERS ====================

function parsePositiveInt(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) {
        throw new InvalidArgumentError('expected a positive integer');
    }
    return n;
}

/**
 * Epoch milliseconds, epoch seconds, or an ISO date-time (read in `zone`
 * when it carries no offset).
 */
export function parseInstant(value: string, zone: string): EpochMs {
    const trimmed = value.trim();
    if (/^-?\d+$/.test(trimmed)) {
        return validateEpoch(trimmed, 'timestamp');
    }
    const dt = DateTime.fromISO(trimmed, { zone });
    if (!dt.isValid) {
        throw createValidationError(`"${value}" is neither an epoch timestamp nor an ISO date-time`);
    }
    return dt.toMillis();
}

// ==================== CONTEXT ====================

interface GlobalOptions {
    data?: string;
}

interface Context {
    config: CostingConfig;
    dataFile: string;
    store: MemoryStore;
}

function setupRuntime(env: NodeJS.ProcessEnv): CostingConfig {
    const config = loadConfig(env);
    if (config.logLevel !== null) {
        setLogLevel(config.logLevel);
    }
    initErrorReporting(config.sentry);
    return config;
}

async function openContext(program: Command, env: NodeJS.ProcessEnv): Promise<Context> {
    const config = setupRuntime(env);
    const dataFile = program.opts<GlobalOptions>().data ?? config.dataFile;
    const dataset = await loadDataset(dataFile);
    const store = new MemoryStore(dataset, { leaseMs: config.queueLeaseMs });
    return { config, dataFile, store };
}

function recomputeDeps(ctx: Context): RecomputeDeps {
    return {
        timers: ctx.store,
        wages: ctx.store,
        fx: ctx.store,
        tasks: ctx.store,
        snapshots: ctx.store,
        settings: {
            businessCalendar: ctx.config.businessCalendar,
            wageMonthHours: ctx.config.wageMonthHours,
            fxMissingPolicy: ctx.config.fxMissingPolicy,
            defaultCurrency: ctx.config.defaultCurrency,
            reportingCurrency: ctx.config.reportingCurrency,
        },
    };
}

function interruptSource(): CancellationSource {
    const source = new CancellationSource();
    process.once('SIGINT', () => source.cancel('interrupted'));
    return source;
}

function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}

/**
 * Runs a command body, turning any failure into a report, an error line on
 * stderr and a non-zero exit code.
 */
async function run(operation: string, body: () => Promise<void>): Promise<void> {
    try {
        await body();
    } catch (error) {
        reportError(toError(error), { module: 'main', operation, level: 'error' });
        const title = isFriendlyError(error) ? error.title : 'Error';
        console.error(`${title}: ${describeError(error)}`);
        process.exitCode = 1;
    } finally {
        await flushErrorReports();
    }
}

// ==================== PROGRAM ====================

/**
 * Builds the command tree. `env` supplies configuration.
 */
export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
    const program = new Command('shopfloor-costing')
        .description('Job costing, machine calendar and timeline tools')
        .version('1.0.0')
        .option('-d, --data <file>', 'dataset file (default: $COSTING_DATA_FILE or costing-data.json)');

    program
        .command('drain')
        .description('Recompute queued tasks until the queue is empty')
        .option('-b, --batch <n>', 'entries claimed per batch', parsePositiveInt)
        .option('-w, --workers <n>', 'concurrent lanes', parsePositiveInt)
        .option('-m, --max <n>', 'stop after this many tasks', parsePositiveInt)
        .action((options: { batch?: number; workers?: number; max?: number }) =>
            run('drain', async () => {
                const ctx = await openContext(program, env);
                const deps = recomputeDeps(ctx);
                const result = await drainQueue(ctx.store.queue, (taskId) => recomputeTaskCostSnapshot(taskId, deps), {
                    batchSize: options.batch ?? ctx.config.queueBatchSize,
                    workers: options.workers ?? ctx.config.workers,
                    maxTasks: options.max,
                    token: anyToken(interruptSource().token, stopFileToken(ctx.config.stopFile)),
                });
                await saveDataset(ctx.dataFile, ctx.store.toDataset());

                console.log(`Processed ${result.processed} task(s)`);
                if (result.failed > 0) console.log(`Failed ${result.failed} task(s); they stay queued`);
                if (result.cancelled) console.log('Stopped before the queue was empty');
            })
        );

    program
        .command('enqueue')
        .description('Queue tasks whose timers match the filters')
        .option('--since <date>', 'timers starting on or after this local date (YYYY-MM-DD)')
        .option('--until <date>', 'timers starting on or before this local date (YYYY-MM-DD)')
        .option('--prefix <jobNo>', 'job number prefix')
        .option('--limit <n>', 'most tasks to enqueue', parsePositiveInt)
        .option('--recompute', 'recompute the matched tasks right away')
        .action(
            (options: { since?: string; until?: string; prefix?: string; limit?: number; recompute?: boolean }) =>
                run('enqueue', async () => {
                    const ctx = await openContext(program, env);
                    const taskIds = await enqueueJobCosts(
                        { since: options.since, until: options.until, prefix: options.prefix, limit: options.limit },
                        {
                            timers: ctx.store,
                            tasks: ctx.store,
                            queue: ctx.store.queue,
                            timezone: ctx.config.businessCalendar.timezone,
                        }
                    );
                    if (taskIds.length === 0) {
                        console.log('No tasks found to enqueue.');
                        return;
                    }
                    console.log(`Enqueued ${taskIds.length} task(s).`);

                    if (options.recompute) {
                        const deps = recomputeDeps(ctx);
                        const outcomes = await recomputeTasks(
                            taskIds,
                            (taskId) => recomputeTaskCostSnapshot(taskId, deps),
                            { workers: ctx.config.workers }
                        );
                        const done = outcomes.filter((o) => o.status === 'ok').length;
                        console.log(`Recomputed ${done}/${taskIds.length} task(s).`);
                    }
                    await saveDataset(ctx.dataFile, ctx.store.toDataset());
                })
        );

    program
        .command('recompute')
        .description('Recompute snapshots for one task or every task')
        .option('-t, --task <id>', 'only this task')
        .option('-w, --workers <n>', 'concurrent lanes', parsePositiveInt)
        .action((options: { task?: string; workers?: number }) =>
            run('recompute', async () => {
                const ctx = await openContext(program, env);
                const stopFile = ctx.config.stopFile;
                await rm(stopFile, { force: true });

                try {
                    const taskIds = options.task
                        ? [options.task]
                        : (await ctx.store.listTasks()).map((t) => t.id).sort();
                    const workers = options.workers ?? ctx.config.workers;
                    console.log(`Recomputing ${taskIds.length} task(s) with ${workers} worker(s)...`);
                    console.log('To stop, run: shopfloor-costing stop');

                    const deps = recomputeDeps(ctx);
                    const outcomes = await recomputeTasks(taskIds, (taskId) => recomputeTaskCostSnapshot(taskId, deps), {
                        workers,
                        token: anyToken(interruptSource().token, stopFileToken(stopFile)),
                    });
                    for (const outcome of outcomes) {
                        if (outcome.status === 'ok') console.log(`Recomputed ${outcome.taskId}`);
                        else if (outcome.status === 'failed') console.log(`Error recomputing ${outcome.taskId}: ${outcome.error}`);
                    }
                    const notStarted = outcomes.filter((o) => o.status === 'cancelled').length;
                    if (notStarted > 0) console.log(`Stopped; ${notStarted} task(s) not started`);

                    await saveDataset(ctx.dataFile, ctx.store.toDataset());
                } finally {
                    await rm(stopFile, { force: true });
                    console.log('Recomputation finished.');
                }
            })
        );

    program
        .command('stop')
        .description('Signal a running recompute or drain to stop between tasks')
        .action(() =>
            run('stop', async () => {
                const config = setupRuntime(env);
                if (existsSync(config.stopFile)) {
                    console.log('Stop signal has already been sent.');
                    return;
                }
                await writeFile(config.stopFile, '', 'utf8');
                console.log('Stop signal sent. Running work stops after the current tasks.');
            })
        );

    program
        .command('validate-plan')
        .description('Check a planned interval against a machine calendar')
        .requiredOption('-m, --machine <id>', 'machine id')
        .requiredOption('-s, --start <instant>', 'planned start (epoch ms/s or ISO date-time)')
        .requiredOption('-e, --end <instant>', 'planned end (epoch ms/s or ISO date-time)')
        .action((options: { machine: string; start: string; end: string }) =>
            run('validate-plan', async () => {
                const ctx = await openContext(program, env);
                const calendar = resolveMachineCalendar(
                    await ctx.store.calendarFor(options.machine),
                    ctx.config.businessCalendar.timezone
                );
                const violation = validatePlanInterval(
                    calendar,
                    parseInstant(options.start, calendar.timezone),
                    parseInstant(options.end, calendar.timezone),
                    { maxPlanDays: ctx.config.maxPlanDays }
                );
                if (violation) {
                    console.log(violation);
                    process.exitCode = 2;
                } else {
                    console.log('OK');
                }
            })
        );

    const windowOptions = (cmd: Command) =>
        cmd
            .requiredOption('-m, --machine <id>', 'machine id')
            .option('--from <instant>', 'window start (default: start of today)')
            .option('--to <instant>', 'window end (default: end of today)');

    windowOptions(program.command('timeline').description("Print a machine's timeline as JSON")).action(
        (options: { machine: string; from?: string; to?: string }) =>
            run('timeline', async () => {
                const ctx = await openContext(program, env);
                const zone = ctx.config.businessCalendar.timezone;
                const window = resolveWindow(
                    options.from === undefined ? null : parseInstant(options.from, zone),
                    options.to === undefined ? null : parseInstant(options.to, zone),
                    zone
                );
                printJson(await buildMachineTimeline(options.machine, window, { timers: ctx.store, tasks: ctx.store }));
            })
    );

    windowOptions(program.command('plan').description("Print a machine's plan as JSON")).action(
        (options: { machine: string; from?: string; to?: string }) =>
            run('plan', async () => {
                const ctx = await openContext(program, env);
                const zone = ctx.config.businessCalendar.timezone;
                const window = resolveWindow(
                    options.from === undefined ? null : parseInstant(options.from, zone),
                    options.to === undefined ? null : parseInstant(options.to, zone),
                    zone
                );
                printJson(await buildMachinePlan(options.machine, window, { tasks: ctx.store }));
            })
    );

    program
        .command('check-calendar <file>')
        .description('Validate a machine calendar definition (JSON)')
        .action((file: string) =>
            run('check-calendar', async () => {
                setupRuntime(env);
                let raw: unknown;
                try {
                    raw = JSON.parse(await readFile(file, 'utf8'));
                } catch (error) {
                    throw createValidationError(`${file}: ${describeError(error)}`);
                }
                const check = validateCalendarDefinition(raw);
                if (check.ok) {
                    console.log(`OK: calendar for machine ${check.calendar.machineId}`);
                    return;
                }
                for (const problem of check.errors) console.log(problem);
                process.exitCode = 2;
            })
        );

    program
        .command('export')
        .description('Write cost snapshots to a CSV file')
        .requiredOption('-o, --out <file>', 'output CSV path')
        .action((options: { out: string }) =>
            run('export', async () => {
                const ctx = await openContext(program, env);
                const rows: SnapshotExportRow[] = [];
                const tasks = (await ctx.store.listTasks()).sort((a, b) => a.id.localeCompare(b.id));
                for (const task of tasks) {
                    const snapshot = await ctx.store.taskSnapshot(task.id);
                    if (snapshot) {
                        rows.push({ task: snapshot, users: await ctx.store.userSnapshots(task.id) });
                    }
                }
                const count = await writeSnapshotCsv(options.out, rows);
                console.log(`Exported ${count} task snapshot(s) to ${options.out}`);
            })
        );

    return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
    await buildProgram().parseAsync([...argv]);
}

// Start (auto-run only when executed directly)
if (require.main === module) {
    main().catch((error: unknown) => {
        logger.error(`Fatal: ${describeError(error)}`);
        process.exitCode = 1;
    });
}

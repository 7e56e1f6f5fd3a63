/**
 * @fileoverview Runtime Configuration
 * Reads the costing engine's settings from environment variables, validates
 * them, and fills in defaults from `constants.ts`.
 *
 * | Variable | Default |
 * |---|---|
 * | `COSTING_BUSINESS_TZ` | `Europe/Istanbul` |
 * | `COSTING_DEFAULT_CURRENCY` | `TRY` |
 * | `COSTING_REPORTING_CURRENCY` | `EUR` (only EUR is accepted) |
 * | `COSTING_WAGE_MONTH_HOURS` | `225` |
 * | `COSTING_FX_MISSING` | `skip` |
 * | `COSTING_MAX_PLAN_DAYS` | `7` |
 * | `COSTING_QUEUE_BATCH` | `100` |
 * | `COSTING_QUEUE_LEASE_MS` | `300000` |
 * | `COSTING_WORKERS` | `4` |
 * | `COSTING_DATA_FILE` | `costing-data.json` |
 * | `COSTING_STOP_FILE` | `recompute_job_costs.stop` |
 * | `COSTING_LOG_LEVEL` | `info` (`warn` in production) |
 * | `SENTRY_DSN` | empty (disabled) |
 * | `SENTRY_ENVIRONMENT` | `NODE_ENV` or `development` |
 * | `COSTING_RELEASE` | `shopfloor-costing@1.0.0` |
 */

import { z } from 'zod';
import { BUSINESS_WORK_WINDOW, CONSTANTS, CURRENCIES, FILE_DEFAULTS, QUEUE_DEFAULTS } from './constants.js';
import { parseLogLevel, type LogLevel } from './logger.js';
import type { SentryConfig } from './error-reporting.js';
import type { BusinessCalendar, Currency, FxMissingPolicy } from './types.js';
import { IsoUtils, createValidationError } from './utils.js';

export interface CostingConfig {
    businessCalendar: BusinessCalendar;
    defaultCurrency: Currency;
    reportingCurrency: 'EUR';
    wageMonthHours: number;
    fxMissingPolicy: FxMissingPolicy;
    maxPlanDays: number;
    queueBatchSize: number;
    queueLeaseMs: number;
    workers: number;
    dataFile: string;
    stopFile: string;
    logLevel: LogLevel | null;
    sentry: SentryConfig;
}

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    COSTING_BUSINESS_TZ: z
        .string()
        .default(CONSTANTS.DEFAULT_TIMEZONE)
        .refine((zone) => IsoUtils.isValidZone(zone), { message: 'unknown IANA timezone' }),
    COSTING_DEFAULT_CURRENCY: z.enum(CURRENCIES).default('TRY'),
    COSTING_REPORTING_CURRENCY: z.literal(CONSTANTS.REPORTING_CURRENCY).default(CONSTANTS.REPORTING_CURRENCY),
    COSTING_WAGE_MONTH_HOURS: z.coerce.number().positive().default(CONSTANTS.WAGE_MONTH_HOURS),
    COSTING_FX_MISSING: z.enum(['skip', 'zero-cost']).default('skip'),
    COSTING_MAX_PLAN_DAYS: positiveInt(CONSTANTS.MAX_PLAN_DAYS),
    COSTING_QUEUE_BATCH: positiveInt(QUEUE_DEFAULTS.BATCH_SIZE),
    COSTING_QUEUE_LEASE_MS: positiveInt(QUEUE_DEFAULTS.LEASE_MS),
    COSTING_WORKERS: positiveInt(QUEUE_DEFAULTS.WORKERS),
    COSTING_DATA_FILE: z.string().min(1).default(FILE_DEFAULTS.DATA_FILE),
    COSTING_STOP_FILE: z.string().min(1).default(FILE_DEFAULTS.STOP_FILE),
    COSTING_LOG_LEVEL: z
        .string()
        .optional()
        .refine((value) => value === undefined || parseLogLevel(value) !== null, {
            message: 'expected one of debug, info, warn, error, none',
        }),
    SENTRY_DSN: z.string().default(''),
    SENTRY_ENVIRONMENT: z.string().optional(),
    COSTING_RELEASE: z.string().default('shopfloor-costing@1.0.0'),
    NODE_ENV: z.string().optional(),
});

/**
 * Empty strings count as unset so `FOO=` in a shell falls back to the default.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            out[key] = value.trim();
        }
    }
    return out;
}

/**
 * Builds the configuration from an environment map.
 *
 * @throws FriendlyError with VALIDATION type naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CostingConfig {
    const parsed = envSchema.safeParse(withoutBlanks(env));
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        throw createValidationError(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;

    return {
        businessCalendar: {
            timezone: e.COSTING_BUSINESS_TZ,
            workStart: BUSINESS_WORK_WINDOW.start,
            workEnd: BUSINESS_WORK_WINDOW.end,
        },
        defaultCurrency: e.COSTING_DEFAULT_CURRENCY,
        reportingCurrency: e.COSTING_REPORTING_CURRENCY,
        wageMonthHours: e.COSTING_WAGE_MONTH_HOURS,
        fxMissingPolicy: e.COSTING_FX_MISSING,
        maxPlanDays: e.COSTING_MAX_PLAN_DAYS,
        queueBatchSize: e.COSTING_QUEUE_BATCH,
        queueLeaseMs: e.COSTING_QUEUE_LEASE_MS,
        workers: e.COSTING_WORKERS,
        dataFile: e.COSTING_DATA_FILE,
        stopFile: e.COSTING_STOP_FILE,
        logLevel: parseLogLevel(e.COSTING_LOG_LEVEL),
        sentry: {
            dsn: e.SENTRY_DSN,
            environment: e.SENTRY_ENVIRONMENT ?? e.NODE_ENV ?? 'development',
            release: e.COSTING_RELEASE,
        },
    };
}

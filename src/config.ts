import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const nullableNumber = z.number().nonnegative().nullable();

export const InputSchema = z.object({
    product: z
        .object({
            manufacturer: z.string().trim().min(1).default('벤츠'),
            modelGroup: z.string().trim().min(1).default('GLE-클래스'),
        })
        .default({}),
    search: z
        .object({
            yearMin: z.number().int().nullable().default(2021),
            yearMax: z.number().int().nullable().default(null),
            priceMin: nullableNumber.default(null),
            priceMax: nullableNumber.default(9000),
            mileageMax: nullableNumber.default(null),
        })
        .default({}),
    monitoring: z
        .object({
            checkIntervalMinutes: z.number().positive().default(10),
            quickScanIntervalMinutes: z.number().positive().default(5),
            closureScanIntervalHours: z.number().positive().default(6),
            cleanupIntervalDays: z.number().positive().default(7),
            tickSeconds: z.number().positive().default(30),
            pageSize: z.number().int().min(1).max(100).default(20),
            regularScanPages: z.number().int().min(1).default(3),
            populationMinPages: z.number().int().min(1).default(10),
            populationMaxPages: z.number().int().min(1).default(60),
            populationCoverage: z.number().positive().max(1).default(0.8),
            pageDelayMs: z.number().int().nonnegative().default(2000),
            enrichmentSampleSize: z.number().int().nonnegative().default(5),
            notificationWindowMinutes: z.number().positive().default(15),
            coupeOnly: z.boolean().default(true),
            batchAlertThreshold: z.number().int().min(1).default(5),
            // 23:00 UTC is 08:00 in Korea. Null turns the daily summary off.
            dailySummaryHourUtc: z.number().int().min(0).max(23).nullable().default(23),
        })
        .default({}),
    newListingCriteria: z
        .object({
            recentRegistrationDays: z.number().int().nonnegative().default(7),
            maxViewsForNew: z.number().int().nonnegative().default(100),
            immediateAlertMaxViews: z.number().int().nonnegative().default(10),
            maxRegistrationAgeDays: z.number().int().nonnegative().default(30),
        })
        .default({}),
    closure: z
        .object({
            minAgeDays: z.number().nonnegative().default(7),
            batchSize: z.number().int().min(1).default(50),
            delayMs: z.number().int().nonnegative().default(2000),
        })
        .default({}),
    retention: z
        .object({
            listingDays: z.number().positive().default(90),
            monitoringLogDays: z.number().positive().default(30),
        })
        .default({}),
    acquisition: z
        .object({
            sessionTtlMinutes: z.number().positive().default(60),
            maxAttempts: z.number().int().min(1).default(3),
            retryDelayMs: z.number().int().nonnegative().default(2000),
            requestTimeoutMs: z.number().int().positive().default(30_000),
        })
        .default({}),
    browser: z
        .object({
            headless: z.boolean().default(true),
            navigationTimeoutMs: z.number().int().positive().default(30_000),
            settleMs: z.number().int().nonnegative().default(3000),
            executablePath: z.string().nullable().default(null),
        })
        .default({}),
    database: z
        .object({
            path: z.string().min(1).default('listings.db'),
        })
        .default({}),
    telegram: z
        .object({
            enabled: z.boolean().default(false),
            botToken: z.string().default(''),
            chatId: z.string().default(''),
            maxMessagesPerMinute: z.number().int().min(1).default(20),
        })
        .default({}),
});

export type Input = z.infer<typeof InputSchema>;

/** Validates raw actor input, filling every missing option with its default. */
export const parseInput = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Input => {
    const result = InputSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
    }

    const input = result.data;
    const botToken = input.telegram.botToken || env.TELEGRAM_BOT_TOKEN || '';
    const chatId = input.telegram.chatId || env.TELEGRAM_CHAT_ID || '';
    if (input.telegram.enabled && (!botToken || !chatId)) {
        throw new ConfigurationError(['telegram: botToken and chatId are required when telegram is enabled']);
    }

    return { ...input, telegram: { ...input.telegram, botToken, chatId } };
};

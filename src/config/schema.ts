import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const AnnouncementModeSchema = z.enum(['casual', 'formal'])

export const RetrySchema = z.object({
    maxRetries: z.number().int().min(0).optional(),
    baseDelay: z.number().nonnegative().optional(),
    maxDelay: z.number().nonnegative().optional(),
})

export const ConfigSchema = z
    .object({
        ledgerPath: z.string().min(1).optional(),
        membersPath: z.string().min(1).optional(),
        adminHandle: z.string().optional(),
        announceChannel: z.string().min(1).optional(),
        staleAfterHours: z.number().positive().optional(),
        lookbackHours: z.number().positive().optional(),
        announcementMode: AnnouncementModeSchema.optional(),
        logLevel: LogLevelSchema.optional(),
        notifyRetry: RetrySchema.optional(),
    })
    .strict()

export type Config = z.infer<typeof ConfigSchema>

export type LogLevel = z.infer<typeof LogLevelSchema>

export type AnnouncementMode = z.infer<typeof AnnouncementModeSchema>

export interface ResolvedConfig {
    /** Absolute path of the attendance ledger CSV. */
    ledgerPath: string
    /** Absolute path of the member registry CSV. */
    membersPath: string
    adminHandle: string
    announceChannel: string
    staleAfterHours: number
    lookbackHours: number
    announcementMode: AnnouncementMode
    logLevel: LogLevel
    notifyRetry: { maxRetries: number; baseDelay: number; maxDelay: number }
    projectDir: string
    configDir: string
}

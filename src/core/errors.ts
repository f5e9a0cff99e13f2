export type ErrorKind = 'transient' | 'permanent'

export class ShopError extends Error {
    readonly kind: ErrorKind

    constructor(message: string, kind: ErrorKind, options?: ErrorOptions) {
        super(message, options)
        this.name = 'ShopError'
        this.kind = kind
    }
}

export class PermanentError extends ShopError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'permanent', options)
        this.name = 'PermanentError'
    }
}

export type AttendanceErrorCode =
    | 'NOT_FOUND'
    | 'ALREADY_CHECKED_IN'
    | 'NOT_CHECKED_IN'
    | 'INCONSISTENT_STATE'
    | 'INVALID_INDEX'
    | 'SESSION_OPEN'
    | 'UNAUTHORIZED'
    | 'MALFORMED_TIMESTAMP'
    | 'IO_FAILURE'

/**
 * Failure of a ledger or presence operation. Domain operations return these
 * inside a `Result`; only the ledger store throws them (as `IO_FAILURE`).
 */
export class AttendanceError extends PermanentError {
    readonly code: AttendanceErrorCode
    readonly details: Record<string, unknown>

    constructor(code: AttendanceErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
        super(message, options)
        this.name = 'AttendanceError'
        this.code = code
        this.details = details
    }
}

export function isAttendanceError(error: unknown, code?: AttendanceErrorCode): error is AttendanceError {
    if (!(error instanceof AttendanceError)) return false
    return code === undefined || error.code === code
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

function hasErrorCode(error: unknown): error is { code: string } {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
}

const TRANSIENT_SYSTEM_CODES = new Set(['EAGAIN', 'EBUSY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EPIPE'])

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof ShopError) return error.kind
    if (error instanceof TypeError && error.message.includes('fetch')) return 'transient'
    if (hasErrorCode(error) && TRANSIENT_SYSTEM_CODES.has(error.code)) return 'transient'
    return 'permanent'
}

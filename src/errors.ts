export type AttendanceErrorCode = 'STORE_UNAVAILABLE' | 'MISSING_FIELD';

export class AttendanceError extends Error {
    constructor(
        readonly code: AttendanceErrorCode,
        message: string,
        readonly details?: unknown
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class StoreUnavailableError extends AttendanceError {
    constructor(details?: unknown) {
        super('STORE_UNAVAILABLE', 'Attendance store is unavailable', details);
    }
}

export class MissingFieldError extends AttendanceError {
    constructor(readonly field: string) {
        super('MISSING_FIELD', `Missing ${field}`);
    }
}

export type ErrorResponse = {
    error: { code: string; message: string; details?: unknown };
};

export type StoreStatus = 'connected' | 'disconnected';

export type SubmitResult =
    | { outcome: 'accepted' }
    | { outcome: 'rejected'; reason: string };

export type VerifyResponse = {
    status: 'SUCCESS' | 'FAILED';
    message: string;
};

// The triple written by one rotation; `rotatedAt` is seconds since epoch.
export interface CodeRecord {
    code: string;
    rotatedAt: number;
}

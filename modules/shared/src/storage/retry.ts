/**
 * SAML SSO - DynamoDB Retry Utilities
 *
 * Exponential backoff with jitter for transient DynamoDB failures
 * (throttling, provisioned throughput exceeded, 5xx).
 *
 * Retry Strategy:
 * - Exponential backoff: 100ms, 200ms, 400ms, 800ms, 1600ms
 * - Full jitter
 * - Maximum 5 retries by default
 * - Only retries transient/throttling errors
 *
 * @see https://aws.amazon.com/blogs/architecture/exponential-backoff-and-jitter/
 */

// =============================================================================
// Types
// =============================================================================

export interface RetryConfig {
    /** Maximum number of retry attempts (default: 5) */
    maxRetries: number;
    /** Base delay in milliseconds (default: 100) */
    baseDelayMs: number;
    /** Maximum delay in milliseconds (default: 5000) */
    maxDelayMs: number;
}

/** Default retry configuration */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 5,
    baseDelayMs: 100,
    maxDelayMs: 5000,
};

// =============================================================================
// Retryable Error Detection
// =============================================================================

/**
 * Error names that indicate transient failures worth retrying.
 */
const RETRYABLE_ERROR_NAMES = new Set([
    'ProvisionedThroughputExceededException',
    'ThrottlingException',
    'RequestLimitExceeded',
    'InternalServerError',
    'ServiceUnavailable',
    'TransactionConflictException',
]);

/**
 * HTTP status codes that indicate transient failures.
 */
const RETRYABLE_STATUS_CODES = new Set([
    429, // Too Many Requests
    500, // Internal Server Error
    502, // Bad Gateway
    503, // Service Unavailable
    504, // Gateway Timeout
]);

/**
 * Determine if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
        return false;
    }

    if ('name' in error && typeof error.name === 'string' && RETRYABLE_ERROR_NAMES.has(error.name)) {
        return true;
    }

    // AWS SDK v3 errors carry the HTTP status in $metadata
    if ('$metadata' in error && error.$metadata && typeof error.$metadata === 'object') {
        const metadata = error.$metadata;
        if (
            'httpStatusCode' in metadata &&
            typeof metadata.httpStatusCode === 'number' &&
            RETRYABLE_STATUS_CODES.has(metadata.httpStatusCode)
        ) {
            return true;
        }
    }

    if ('$retryable' in error && error.$retryable) {
        return true;
    }

    return false;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay with exponential backoff and full jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @returns Delay in milliseconds
 */
function calculateDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
    const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
    const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
    return Math.floor(Math.random() * cappedDelay);
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Wrapper
// =============================================================================

/**
 * Execute an async operation with retry logic.
 *
 * @throws The last error if all retries are exhausted, or the first
 *   non-retryable error
 *
 * @example
 * ```typescript
 * const result = await withRetry(async () => {
 *   return client.send(new GetCommand({ ... }));
 * });
 * ```
 */
export async function withRetry<T>(
    operation: () => Promise<T>,
    config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
        try {
            return await operation();
        } catch (error) {
            lastError = error;

            if (!isRetryableError(error) || attempt >= config.maxRetries) {
                throw error;
            }

            await sleep(calculateDelay(attempt, config));
        }
    }

    throw lastError;
}

// services/completion/providerErrors.ts
import axios from 'axios';
import {
    AuthFailureError,
    GenericProviderError,
    ModelUnavailableError,
    PipelineError,
    ProviderTimeoutError,
    QuotaExceededError,
    describeError,
} from '../../utils/pipelineErrors';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Maps an HTTP failure from a completion API onto the pipeline error taxonomy.
 * 429 -> quota, 401/403 -> auth, 404 -> model unavailable, timeouts -> timeout.
 */
export const mapProviderError = (provider: string, error: unknown): PipelineError => {
    if (error instanceof PipelineError) return error;

    if (axios.isAxiosError(error)) {
        if (error.code && TIMEOUT_CODES.has(error.code)) {
            return new ProviderTimeoutError(provider, error.message);
        }
        const status = error.response?.status;
        switch (status) {
            case 429:
                return new QuotaExceededError(provider);
            case 401:
            case 403:
                return new AuthFailureError(provider, `Rejected with status ${status}`);
            case 404:
                return new ModelUnavailableError(provider);
            default:
                return new GenericProviderError(provider, status ? `Request failed with status ${status}` : error.message);
        }
    }

    return new GenericProviderError(provider, describeError(error));
};

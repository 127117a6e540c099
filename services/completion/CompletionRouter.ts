// services/completion/CompletionRouter.ts
import logger from '../../utils/logger';
import { AuthFailureError, PipelineError, toPipelineError } from '../../utils/pipelineErrors';
import { ICompletionRequest } from '../../types';
import { ICompletionProvider } from './ICompletionProvider';

// Failures that say nothing about the request itself; the next provider may succeed.
const FAILOVER_KINDS = new Set(['quota_exceeded', 'timeout', 'model_unavailable']);

/**
 * Tries providers in configured order. Quota, timeout and missing-model
 * failures move on to the next provider; anything else surfaces at once.
 */
export class CompletionRouter implements ICompletionProvider {
    public readonly name = 'router';

    constructor(private readonly providers: ICompletionProvider[]) {}

    async complete(request: ICompletionRequest): Promise<string> {
        if (this.providers.length === 0) {
            throw new AuthFailureError(this.name, 'No completion providers configured');
        }

        let lastError: PipelineError | null = null;
        for (const provider of this.providers) {
            try {
                return await provider.complete(request);
            } catch (error: unknown) {
                lastError = toPipelineError(error, provider.name);
                if (!FAILOVER_KINDS.has(lastError.errorKind)) throw lastError;
                logger.warn(`🔀 ${provider.name} unavailable (${lastError.errorKind}), trying next provider`);
            }
        }
        throw lastError ?? new AuthFailureError(this.name, 'No completion providers configured');
    }
}

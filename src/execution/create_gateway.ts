import { HttpExecutionGateway } from './http_gateway.js';
import { PaperGateway } from './paper_gateway.js';
import type { ExecutionGateway } from './types.js';

/**
 * Paper fills in dry run, the external executor otherwise
 */
export function createGateway(dryRun: boolean, executorUrl: string): ExecutionGateway {
    if (dryRun) {
        return new PaperGateway();
    }
    if (!executorUrl) {
        throw new Error('EXECUTION_GATEWAY_URL is required for live orders');
    }
    return new HttpExecutionGateway(executorUrl);
}

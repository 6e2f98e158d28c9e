import OpenAI from 'openai';
import { classifyUpstreamError, GatewayError, upstreamRejected } from '@glimpse/core';

/** Maps openai SDK errors onto the gateway's upstream error kinds. */
export function classifyOpenAIError(error: unknown, label: string): GatewayError {
    if (error instanceof GatewayError) {
        return error;
    }
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
        return new GatewayError('UpstreamTimeout', `${label} timed out: ${error.message}`, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
        return new GatewayError('UpstreamUnreachable', `Could not reach ${label}: ${error.message}`, { cause: error });
    }
    if (error instanceof OpenAI.APIError) {
        return upstreamRejected(label, error.status, error.message);
    }
    return classifyUpstreamError(error, label);
}

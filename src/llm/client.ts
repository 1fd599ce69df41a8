import OpenAI from 'openai'
import type { ResolvedConfig } from '../config/schema.js'
import { errorMessage, TransientError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { Logger } from '../logger/index.js'
import { CircuitBreaker, DEFAULT_RETRY_OPTIONS, type RetryOptions, withRetry } from './retry.js'
import type { ChatMessage, ChatParams, ChatResponse, LLMClient } from './types.js'

function toOpenAIMessage(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: message.content }
        case 'user':
            return { role: 'user', content: message.content }
        case 'assistant':
            return { role: 'assistant', content: message.content }
    }
}

export function createLLMClient(
    config: Pick<ResolvedConfig, 'apiKey' | 'baseURL' | 'model' | 'temperature' | 'maxTokens'>,
    logger: Logger,
    eventBus: TypedEventEmitter
): LLMClient {
    const openai = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        defaultHeaders: { 'X-Title': 'Recourse' },
    })

    const breaker = new CircuitBreaker()

    return {
        async chat(params: ChatParams): Promise<ChatResponse> {
            const model = params.model ?? config.model
            const retry: RetryOptions = {
                ...DEFAULT_RETRY_OPTIONS,
                signal: params.signal,
                onRetry: (attempt, delayMs, error) => logger.warn({ model, attempt, delayMs, error: errorMessage(error) }, 'llm:retry'),
            }

            const result = await breaker.execute(() =>
                withRetry(async () => {
                    const response = await openai.chat.completions.create(
                        {
                            model,
                            messages: params.messages.map(toOpenAIMessage),
                            temperature: params.temperature ?? config.temperature,
                            max_tokens: params.maxTokens ?? config.maxTokens,
                            response_format: params.json ? { type: 'json_object' } : undefined,
                        },
                        { signal: params.signal }
                    )

                    const choice = response.choices[0]
                    if (!choice) throw new TransientError('No response from LLM')

                    const finishReason: ChatResponse['finishReason'] = choice.finish_reason === 'length' ? 'length' : 'stop'

                    return {
                        content: choice.message.content,
                        finishReason,
                        usage: {
                            promptTokens: response.usage?.prompt_tokens ?? 0,
                            completionTokens: response.usage?.completion_tokens ?? 0,
                        },
                    }
                }, retry)
            )

            eventBus.emit('token:usage', { prompt: result.usage.promptTokens, completion: result.usage.completionTokens })
            logger.debug({ model, usage: result.usage, finishReason: result.finishReason }, 'llm:response')
            return result
        },
    }
}

import type { ChatParams, ChatResponse, LLMClient } from '../../src/llm/types.js'

export interface ScriptedResponse {
    content: string | null
    finishReason?: 'stop' | 'length'
    usage?: { promptTokens: number; completionTokens: number }
}

export interface CapturedCall {
    params: ChatParams
    timestamp: number
}

export class ScriptedLLMClient implements LLMClient {
    readonly capturedCalls: CapturedCall[] = []
    private callIndex = 0

    constructor(private responses: ScriptedResponse[]) {}

    async chat(params: ChatParams): Promise<ChatResponse> {
        if (params.signal?.aborted) {
            throw new DOMException('The operation was aborted.', 'AbortError')
        }

        this.capturedCalls.push({ params, timestamp: Date.now() })

        const scripted = this.responses[this.callIndex++]
        if (!scripted) {
            throw new Error(
                `ScriptedLLMClient: no more responses (called ${this.callIndex} times, only ${this.responses.length} scripted)`
            )
        }
        return {
            content: scripted.content,
            finishReason: scripted.finishReason ?? 'stop',
            usage: scripted.usage ?? { promptTokens: 10, completionTokens: 10 },
        }
    }

    static fromStrings(strings: string[]): ScriptedLLMClient {
        return new ScriptedLLMClient(strings.map((s) => ({ content: s })))
    }

    static fromJSON(values: unknown[]): ScriptedLLMClient {
        return ScriptedLLMClient.fromStrings(values.map((v) => JSON.stringify(v)))
    }

    getCall(index: number): CapturedCall {
        const call = this.capturedCalls[index]
        if (!call) {
            throw new Error(`ScriptedLLMClient: no call at index ${index} (only ${this.capturedCalls.length} calls captured)`)
        }
        return call
    }

    /** Concatenated system and user text of one call. */
    promptOf(index: number): string {
        return this.getCall(index)
            .params.messages.map((m) => m.content)
            .join('\n')
    }

    get totalCalls(): number {
        return this.capturedCalls.length
    }
}

import { truncate } from '../core/text.js'
import type { LLMClient } from '../llm/types.js'
import type { Logger } from '../logger/index.js'
import type { ToolGateway } from '../tools/gateway.js'
import { RESEARCH_SYSTEM_PROMPT } from './prompts.js'
import { parseWith } from './result-parser.js'
import { ResearchAnswerSchema } from './schemas.js'
import type { Finding, ResearchCollaborator, ResearchScope } from './types.js'

const MAX_URLS = 2
const PAGE_SUMMARY_CHARS = 2_000

/**
 * Answers from the model's own knowledge, then reads up to two pages it points at through the gateway,
 * so fetching is subject to the same capability and permission checks as any other tool call.
 */
export class LLMResearchCollaborator implements ResearchCollaborator {
    constructor(
        private llm: LLMClient,
        private gateway: ToolGateway,
        private timeoutMs: number,
        private logger: Logger
    ) {}

    async research(query: string, scope: ResearchScope): Promise<Finding[]> {
        const response = await this.llm.chat({
            messages: [
                { role: 'system', content: RESEARCH_SYSTEM_PROMPT },
                { role: 'user', content: query },
            ],
            json: true,
            signal: scope.signal,
        })
        const answer = parseWith(ResearchAnswerSchema, response.content, 'research answer')
        const findings: Finding[] = [...answer.findings]

        for (const url of answer.urls.slice(0, MAX_URLS)) {
            const fetched = await this.gateway.invoke('http_get', { url }, { ...scope, timeoutMs: this.timeoutMs })
            if (!fetched.ok) {
                this.logger.debug({ url, error: fetched.error.message }, 'research:fetch-skipped')
                continue
            }
            if (!fetched.value.ok) continue
            findings.push({ source: url, summary: truncate(fetched.value.output, PAGE_SUMMARY_CHARS) })
        }

        this.logger.info({ query, findings: findings.length }, 'research:done')
        return findings
    }
}

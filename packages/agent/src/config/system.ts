import { InvalidArgumentError } from '../core/errors.js';

export const DEFAULT_AGENT_MAX_STEPS = 8;

export const PROVIDER_NAMES = ['openai', 'glm'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface SysConfig {
    /** 远端 Agent 运行时所使用的模型厂商 */
    llmProvider: ProviderName;
    /** 单次查询内允许模型连续调用工具的轮数上限 */
    agentMaxSteps: number;
    requestTimeoutMs: number;
}

function isProviderName(value: string): value is ProviderName {
    return PROVIDER_NAMES.some(name => name === value);
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new InvalidArgumentError(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

export function loadSysConfig(env: NodeJS.ProcessEnv = process.env): SysConfig {
    const llmProvider = (env.LLM_PROVIDER || 'openai').trim().toLowerCase();
    if (!isProviderName(llmProvider)) {
        throw new InvalidArgumentError(
            `LLM_PROVIDER must be one of ${PROVIDER_NAMES.join(', ')}, got "${env.LLM_PROVIDER}"`
        );
    }

    return {
        llmProvider,
        agentMaxSteps: parsePositiveInt('AGENT_MAX_STEPS', env.AGENT_MAX_STEPS, DEFAULT_AGENT_MAX_STEPS),
        requestTimeoutMs: parsePositiveInt('LLM_TIMEOUT_MS', env.LLM_TIMEOUT_MS, 30000),
    };
}

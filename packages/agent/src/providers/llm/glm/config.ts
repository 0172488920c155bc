import type { OpenAICompatibleConfig } from '../openai/config.js';

export function glmConfig(env: NodeJS.ProcessEnv = process.env): OpenAICompatibleConfig {
    return {
        apiKey: env.GLM_API_KEY?.trim() || '',
        baseUrl: env.GLM_BASE_URL || 'https://open.bigmodel.cn/api/paas/v4/',
        model: env.GLM_MODEL || 'glm-4-flash',
    };
}

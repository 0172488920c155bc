export interface OpenAICompatibleConfig {
    apiKey: string;
    baseUrl: string;
    model: string;
}

// 延迟到调用时再读环境变量，保证 .env 加载顺序无关
export function openaiConfig(env: NodeJS.ProcessEnv = process.env): OpenAICompatibleConfig {
    return {
        apiKey: env.OPENAI_API_KEY?.trim() || '',
        baseUrl: env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
        model: env.OPENAI_MODEL || 'gpt-4.1-mini',
    };
}

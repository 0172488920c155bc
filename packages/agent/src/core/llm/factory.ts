import { loadSysConfig, type ProviderName } from '../../config/system.js';
import { GLMProvider } from '../../providers/llm/glm/index.js';
import { glmConfig } from '../../providers/llm/glm/config.js';
import { OpenAIProvider } from '../../providers/llm/openai/index.js';
import { openaiConfig } from '../../providers/llm/openai/config.js';
import { createLogger } from '../logger.js';
import type { ILLMProvider } from './interfaces.js';
import { UnavailableProvider } from './unavailable.js';

const log = createLogger('LLMFactory');

export class LLMFactory {
    /**
     * 按当前环境探测并创建远端运行时。
     * 缺少 API Key 或初始化失败时返回 UnavailableProvider，而不是抛错。
     * @param name - 厂商标识，不传则取 LLM_PROVIDER
     */
    static create(name?: ProviderName, env: NodeJS.ProcessEnv = process.env): ILLMProvider {
        const sysConfig = loadSysConfig(env);
        const providerName = name ?? sysConfig.llmProvider;
        const config = providerName === 'glm' ? glmConfig(env) : openaiConfig(env);

        if (!config.apiKey) {
            const keyName = providerName === 'glm' ? 'GLM_API_KEY' : 'OPENAI_API_KEY';
            log.debug(`${keyName} 未配置，使用不可用占位实现`);
            return new UnavailableProvider(`${keyName} is not configured`);
        }

        const options = { ...config, timeoutMs: sysConfig.requestTimeoutMs };
        try {
            return providerName === 'glm' ? new GLMProvider(options) : new OpenAIProvider(options);
        } catch (error) {
            log.debug(`Provider '${providerName}' 初始化失败:`, error);
            return new UnavailableProvider(`failed to initialise ${providerName}: ${String(error)}`);
        }
    }
}

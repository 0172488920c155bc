import { OpenAIProvider, type OpenAIProviderOptions } from '../openai/index.js';

/**
 * 智谱 GLM：其开放平台提供 OpenAI 兼容的 chat.completions 接口，
 * 只需替换基地址与模型名。
 */
export class GLMProvider extends OpenAIProvider {
    constructor(options: OpenAIProviderOptions) {
        super(options, 'glm');
    }
}

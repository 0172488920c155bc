import type { ChatMessage, ChatOptions, ChatResponse } from './types.js';

/**
 * 远端 Agent 运行时必须实现的访问接口。
 * Resolver 与 AgentExecutor 只认识这个接口，不认识具体的 OpenAI/GLM。
 */
export interface ILLMProvider {
    /** 厂商标识，仅用于日志 */
    readonly name: string;

    /**
     * 普通对话 (非流式，一次性返回全部结果)
     * @param messages 历史消息数组
     * @param options 通用模型选项
     */
    chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;
}

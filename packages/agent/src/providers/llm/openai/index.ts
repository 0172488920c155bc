import OpenAI from 'openai';
import { RemoteUnavailableError } from '../../../core/errors.js';
import type { ILLMProvider } from '../../../core/llm/interfaces.js';
import type { ChatMessage, ChatOptions, ChatResponse } from '../../../core/llm/types.js';
import { createLogger, type Logger } from '../../../core/logger.js';
import type { ISkill, SkillArgs, ToolCallRequest } from '../../../core/skills/types.js';
import type { OpenAICompatibleConfig } from './config.js';

type ChatCompletionMessageParam = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatCompletionTool = OpenAI.Chat.Completions.ChatCompletionTool;
type ChatCompletionCreateParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

/** 只取本模块真正读取的响应字段 */
export interface CompletionResult {
    choices: Array<{
        message: {
            content: string | null;
            tool_calls?: Array<{
                id: string;
                function: { name: string; arguments: string };
            }>;
        };
    }>;
    usage?: {
        prompt_tokens: number;
        completion_tokens: number;
        total_tokens: number;
    };
}

/** OpenAI SDK 客户端中本模块用到的那一部分，测试时可替换为假实现 */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: ChatCompletionCreateParams): Promise<CompletionResult>;
        };
    };
}

export interface OpenAIProviderOptions extends OpenAICompatibleConfig {
    timeoutMs?: number;
    client?: ChatCompletionsClient;
}

/**
 * 把模型返回的 JSON 字符串参数解析成对象，解析失败视为远端协议错误
 */
export function parseToolArguments(raw: string): SkillArgs {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new RemoteUnavailableError(`tool call arguments are not valid JSON: ${raw}`, { cause: error });
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new RemoteUnavailableError(`tool call arguments must be a JSON object: ${raw}`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

/**
 * 基于官方 openai SDK 的 chat.completions 协议实现，
 * 也用于任何兼容该协议的厂商 (通过 baseUrl 切换)。
 */
export class OpenAIProvider implements ILLMProvider {
    readonly name: string;
    private readonly log: Logger;
    private readonly client: ChatCompletionsClient;
    private readonly model: string;

    constructor(options: OpenAIProviderOptions, name = 'openai') {
        this.name = name;
        this.log = createLogger(name);
        this.model = options.model;
        // 不做重试：一次查询最多一次远端会话，失败立即走本地兜底
        this.client = options.client ?? new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            maxRetries: 0,
        });
        this.log.debug(`Provider 初始化完成，基地址: ${options.baseUrl}, 模型: ${this.model}`);
    }

    // 将通用的 ChatMessage 转换为 chat.completions 需要的 messages 对象
    private mapMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
        return messages.map((msg): ChatCompletionMessageParam => {
            switch (msg.role) {
                case 'system':
                    return { role: 'system', content: msg.content };
                case 'user':
                    return { role: 'user', content: msg.content };
                case 'assistant':
                    if (msg.tool_calls && msg.tool_calls.length > 0) {
                        return {
                            role: 'assistant',
                            content: msg.content || null,
                            tool_calls: msg.tool_calls.map(tc => ({
                                id: tc.id,
                                type: 'function' as const,
                                function: {
                                    name: tc.name,
                                    arguments: JSON.stringify(tc.args), // 协议期望这里的 args 是字符串化的
                                },
                            })),
                        };
                    }
                    return { role: 'assistant', content: msg.content };
                case 'tool':
                    if (!msg.tool_call_id) {
                        throw new RemoteUnavailableError('tool message is missing tool_call_id');
                    }
                    return { role: 'tool', tool_call_id: msg.tool_call_id, content: msg.content };
            }
        });
    }

    private mapTools(tools?: ISkill[]): ChatCompletionTool[] | undefined {
        if (!tools || tools.length === 0) return undefined;
        return tools.map(t => ({
            type: 'function' as const,
            function: {
                name: t.name,
                description: t.description,
                parameters: {
                    type: t.parameters.type,
                    properties: t.parameters.properties,
                    required: t.parameters.required ?? [],
                },
            },
        }));
    }

    async chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
        const model = options?.model || this.model;
        this.log.debug(`调用模型 ${model}...`);

        const response = await this.client.chat.completions.create({
            model,
            messages: this.mapMessages(messages),
            tools: this.mapTools(options?.tools),
            temperature: options?.temperature,
            top_p: options?.topP,
            max_tokens: options?.maxTokens,
        });

        const message = response.choices[0]?.message;
        if (!message) {
            throw new RemoteUnavailableError(`${this.name} returned no choices`);
        }

        const toolCalls: ToolCallRequest[] | undefined = message.tool_calls?.map(tc => ({
            id: tc.id,
            type: 'tool_call' as const,
            name: tc.function.name,
            args: parseToolArguments(tc.function.arguments),
        }));

        return {
            content: message.content || '',
            toolCalls: toolCalls && toolCalls.length > 0 ? toolCalls : undefined,
            usage: response.usage ? {
                promptTokens: response.usage.prompt_tokens,
                completionTokens: response.usage.completion_tokens,
                totalTokens: response.usage.total_tokens,
            } : undefined,
        };
    }
}

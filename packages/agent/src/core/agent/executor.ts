import { RemoteUnavailableError } from '../errors.js';
import type { ILLMProvider } from '../llm/interfaces.js';
import type { ChatMessage, ChatOptions } from '../llm/types.js';
import { DEFAULT_AGENT_MAX_STEPS } from '../../config/system.js';
import { createLogger } from '../logger.js';
import type { SkillRegistry } from '../skills/registry.js';

const log = createLogger('Agent Executor');

export interface AgentExecuteOptions extends ChatOptions {
    /** 本次执行最多允许大模型连续挂起并调用工具的轮数，防止陷入死循环 */
    maxSteps?: number;
}

export class AgentExecutor {
    constructor(
        private readonly llm: ILLMProvider,
        private readonly skillRegistry: SkillRegistry
    ) { }

    /**
     * 执行完整的推理与行动循环 (ReAct Loop)
     *
     * @param messages 初始会话历史，新产生的 assistant / tool 消息在原数组尾部原地追加
     * @returns 模型给出的最终回答文本
     */
    public async execute(messages: ChatMessage[], options?: AgentExecuteOptions): Promise<string> {
        const { maxSteps = DEFAULT_AGENT_MAX_STEPS, ...chatOptions }: AgentExecuteOptions = options ?? {};
        const tools = chatOptions.tools ?? this.skillRegistry.getAllSkills();
        const executionOptions: ChatOptions = { ...chatOptions, tools };

        for (let step = 1; step <= maxSteps; step++) {
            log.debug(`--- 第 ${step} 轮思考开始 (${this.llm.name}) ---`);

            const response = await this.llm.chat(messages, executionOptions);
            if (response.usage) {
                log.debug(`本轮 Token 消耗: ${response.usage.totalTokens} (prompt ${response.usage.promptTokens} / completion ${response.usage.completionTokens})`);
            }

            // 模型不再要求调用工具，说明已得出最终回答
            if (!response.toolCalls || response.toolCalls.length === 0) {
                log.debug('思考完毕，得出最终结论。');
                messages.push({ role: 'assistant', content: response.content });
                return response.content;
            }

            log.debug(`决定挂起并执行动作 -> 工具数: ${response.toolCalls.length}`);
            messages.push({
                role: 'assistant',
                content: response.content,
                tool_calls: response.toolCalls,
            });

            for (const call of response.toolCalls) {
                const output = await this.skillRegistry.executeToolCall(call.name, call.args);
                messages.push({
                    role: 'tool',
                    name: call.name,
                    tool_call_id: call.id,
                    content: output,
                });
            }
        }

        throw new RemoteUnavailableError(`agent did not finish within ${maxSteps} steps`);
    }
}

import type { ISkill, ToolCallRequest } from '../skills/types.js';

/**
 * 角色定义：兼容各大模型的标准角色命名
 * tool: 用于提交工具调用结果的角色
 */
export type Role = 'system' | 'user' | 'assistant' | 'tool';

/**
 * 标准化的对话消息体内结构
 */
export interface ChatMessage {
    role: Role;
    content: string;
    name?: string;

    // 如果 role 是 tool，必须携带所回应的那一次 tool_call 的 ID
    tool_call_id?: string;

    // 如果 role 是 assistant 并且想调用工具，会在此字段携带要调用的详细列表
    tool_calls?: ToolCallRequest[];
}

/**
 * 统一的对话参数选项 (可选，不同大模型会择其所用)
 */
export interface ChatOptions {
    model?: string; // 如果不传，由 Provider 自己的 config 决定默认模型
    temperature?: number;
    maxTokens?: number;
    topP?: number;

    /** 注入可供大模型使用的技能 (Tools) */
    tools?: ISkill[];
}

/**
 * 统一的纯文本响应或者挂起响应(包含 toolCalls)
 */
export interface ChatResponse {
    content: string;

    /** 如果模型没有回复文本而是挂起要求调用系统函数，会返回该集合 */
    toolCalls?: ToolCallRequest[];
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

export interface ISkillParameterProperties {
    [key: string]: {
        type: 'string' | 'number' | 'boolean' | 'object' | 'array';
        description: string;
        enum?: string[];
        properties?: ISkillParameterProperties; // 用于 type 为 object 时
    };
}

export interface ISkillParameters {
    type: 'object';
    properties: ISkillParameterProperties;
    required?: string[];
}

/** 工具调用时模型传来的参数，已经从 JSON 字符串解析为对象 */
export type SkillArgs = Record<string, unknown>;

export interface ISkill {
    /** 技能全局唯一名称标识，受限于大部分模型规范，请使用 /^[a-zA-Z0-9_]+$/ 格式 */
    name: string;
    /** 给大模型看的技能描述：解释什么情况下应该调用这个技能，以及各个参数的含义 */
    description: string;
    /** JSON Schema 格式的参数描述 */
    parameters: ISkillParameters;
    /** 真实的业务执行代码 */
    execute(args: SkillArgs): Promise<unknown> | unknown;
}

/** LLM 遇到需要调用工具时，返回的数据结构封装 */
export interface ToolCallRequest {
    /** 唯一标识本次调用的 ID，提交工具结果时必须原样带回 */
    id: string;
    type: 'tool_call';
    name: string;
    args: SkillArgs;
}

import { createLogger } from '../logger.js';
import type { ISkill, SkillArgs } from './types.js';

const log = createLogger('SkillRegistry');

/**
 * 技能注册表。每个 Agent 持有自己的实例，不做全局单例。
 */
export class SkillRegistry {
    private skills: Map<string, ISkill> = new Map();

    /**
     * 注册一个技能
     */
    public register(skill: ISkill): void {
        if (this.skills.has(skill.name)) {
            log.warn(`覆盖了已存在的技能: ${skill.name}`);
        }
        this.skills.set(skill.name, skill);
        log.debug(`已注册技能: ${skill.name}`);
    }

    /**
     * 批量注册技能
     */
    public registerAll(skills: ISkill[]): void {
        for (const skill of skills) {
            this.register(skill);
        }
    }

    public getSkill(name: string): ISkill | undefined {
        return this.skills.get(name);
    }

    /**
     * 获取所有已挂载的技能列表 (用于传给 LLM)
     */
    public getAllSkills(): ISkill[] {
        return Array.from(this.skills.values());
    }

    /**
     * 执行一次工具调用，结果统一转为字符串交还给模型。
     * 找不到技能或技能执行失败都会直接抛出，由上层决定如何降级。
     */
    public async executeToolCall(name: string, args: SkillArgs): Promise<string> {
        const skill = this.skills.get(name);
        if (!skill) {
            throw new Error(`找不到对应的技能实现: ${name}`);
        }

        log.debug(`正在执行技能 [${name}] ... 参数:`, args);
        try {
            const result = await skill.execute(args);
            return typeof result === 'string' ? result : JSON.stringify(result);
        } catch (error) {
            log.debug(`执行技能 [${name}] 时发生错误:`, error);
            throw error;
        }
    }
}

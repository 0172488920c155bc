import { AgentExecutor } from '../agent/executor.js';
import { createWeatherAgent } from '../agent/definition.js';
import { LLMFactory } from '../llm/factory.js';
import type { ILLMProvider } from '../llm/interfaces.js';
import { createLogger } from '../logger.js';
import { SkillRegistry } from '../skills/registry.js';
import { loadSysConfig } from '../../config/system.js';
import { SIMULATED_DATASET, type WeatherDataset } from './dataset.js';

const log = createLogger('WeatherResolver');

export interface ResolveWeatherOptions {
    dataset?: WeatherDataset;
    /** 不传则取 AGENT_MAX_STEPS */
    maxSteps?: number;
}

/**
 * 走远端 Agent 查询；任何失败都返回 undefined，交由调用方兜底。
 */
async function queryRemoteAgent(
    location: string,
    dataset: WeatherDataset,
    client: ILLMProvider | undefined,
    maxSteps: number | undefined
): Promise<string | undefined> {
    try {
        const runtime = client ?? LLMFactory.create();
        const agent = createWeatherAgent(dataset);

        log.debug(`${agent.name} 通过 ${runtime.name} 发起查询: ${location}`);

        const registry = new SkillRegistry();
        registry.registerAll(agent.skills);

        const executor = new AgentExecutor(runtime, registry);
        const answer = await executor.execute(
            [
                { role: 'system', content: agent.instructions },
                { role: 'user', content: location },
            ],
            {
                model: agent.model,
                maxSteps: maxSteps ?? loadSysConfig().agentMaxSteps,
            }
        );

        return answer.trim();
    } catch (error) {
        log.info('远端 Agent 不可用，退回本地模拟数据:', error instanceof Error ? error.message : error);
        return undefined;
    }
}

/**
 * 查询地点天气：优先交给远端 Agent（工具由本地天气表实现），
 * 远端任何环节失败时直接返回本地天气表结果。
 *
 * 唯一会抛给调用方的是本地查询的 InvalidArgumentError（空白地点）。
 */
export async function resolveWeather(
    location: string,
    client?: ILLMProvider,
    options: ResolveWeatherOptions = {}
): Promise<string> {
    const dataset = options.dataset ?? SIMULATED_DATASET;

    const remote = await queryRemoteAgent(location, dataset, client, options.maxSteps);
    if (remote !== undefined) {
        return remote;
    }

    return dataset.lookup(location);
}

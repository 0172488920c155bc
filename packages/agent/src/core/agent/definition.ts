import type { ISkill } from '../skills/types.js';
import { createWeatherSkill, WEATHER_SKILL_NAME } from '../../skills/weather/index.js';
import { SIMULATED_DATASET, type WeatherDataset } from '../weather/dataset.js';

/** 创建一次远端会话所需的 Agent 描述 */
export interface AgentDefinition {
    name: string;
    /** 不传则由 Provider 自己的配置决定 */
    model?: string;
    instructions: string;
    skills: ISkill[];
}

export function createWeatherAgent(dataset: WeatherDataset = SIMULATED_DATASET, model?: string): AgentDefinition {
    return {
        name: 'Mock Weather Agent',
        model,
        instructions:
            'You are a weather lookup agent. When the user names a location, ' +
            `call the ${WEATHER_SKILL_NAME} tool and answer with the weather it returns.`,
        skills: [createWeatherSkill(dataset)],
    };
}

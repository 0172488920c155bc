import { InvalidArgumentError } from '../../core/errors.js';
import { createLogger } from '../../core/logger.js';
import type { ISkill, SkillArgs } from '../../core/skills/types.js';
import { SIMULATED_DATASET, type WeatherDataset } from '../../core/weather/dataset.js';

const log = createLogger('WeatherSkill');

export const WEATHER_SKILL_NAME = 'get_mock_weather';

function readLocation(args: SkillArgs): string {
    const location = args.location;
    if (typeof location !== 'string') {
        throw new InvalidArgumentError(`${WEATHER_SKILL_NAME} expects a string "location" argument`);
    }
    return location;
}

/**
 * 把天气表包装成可交给远端模型调用的工具，执行体就是 dataset.lookup。
 */
export function createWeatherSkill(dataset: WeatherDataset = SIMULATED_DATASET): ISkill {
    return {
        name: WEATHER_SKILL_NAME,
        description: 'Return a mock weather string for the given location.',
        parameters: {
            type: 'object',
            properties: {
                location: {
                    type: 'string',
                    description: 'Name of the location, e.g. "Beijing"',
                },
            },
            required: ['location'],
        },
        execute: (args: SkillArgs) => {
            const location = readLocation(args);
            log.debug(`接收到查询请求: 地点=${location}`);
            return dataset.lookup(location);
        },
    };
}

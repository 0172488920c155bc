import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ScriptedProvider, toolCall } from '../../testing/scripted-provider.js';
import { InvalidArgumentError, RemoteUnavailableError } from '../errors.js';
import { UnavailableProvider } from '../llm/unavailable.js';
import { SIMULATED_DATASET, WeatherDataset } from './dataset.js';
import { resolveWeather } from './resolver.js';

describe('resolveWeather', () => {
    beforeEach(() => {
        vi.stubEnv('LOG_LEVEL', 'silent');
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it('falls back to the dataset when the client cannot complete the protocol', async () => {
        const broken = new ScriptedProvider([new TypeError('client.agents is undefined')]);

        const result = await resolveWeather('Unknown City', broken);

        expect(result).toBe('Unknown City: clear, 25°C, light breeze');
        expect(result).toBe(SIMULATED_DATASET.lookup('Unknown City'));
    });

    it('falls back to the curated entry for a known city', async () => {
        const result = await resolveWeather('Shenzhen', new UnavailableProvider('no key'));
        expect(result).toBe(SIMULATED_DATASET.lookup('Shenzhen'));
    });

    it('surfaces InvalidArgumentError for blank input when the remote path fails', async () => {
        await expect(resolveWeather('   ', new UnavailableProvider('no key'))).rejects.toBeInstanceOf(
            InvalidArgumentError
        );
    });

    it('returns the trimmed remote answer after serving tool calls locally', async () => {
        const llm = new ScriptedProvider([
            toolCall('call_42', { location: 'Beijing' }),
            { content: '  Beijing is cloudy at 22°C.  \n' },
        ]);

        const result = await resolveWeather('Beijing', llm);

        expect(result).toBe('Beijing is cloudy at 22°C.');
        const [first, second] = llm.calls;
        expect(first?.messages).toEqual([
            {
                role: 'system',
                content:
                    'You are a weather lookup agent. When the user names a location, ' +
                    'call the get_mock_weather tool and answer with the weather it returns.',
            },
            { role: 'user', content: 'Beijing' },
        ]);
        expect(second?.messages.at(-1)).toEqual({
            role: 'tool',
            name: 'get_mock_weather',
            tool_call_id: 'call_42',
            content: 'Beijing: cloudy, 22°C, northeast wind force 3',
        });
    });

    it('serves tool calls from the dataset passed in the options', async () => {
        const dataset = new WeatherDataset({ Harbin: 'Harbin: snow, -12°C, north wind' });
        const llm = new ScriptedProvider([
            toolCall('call_1', { location: 'harbin' }),
            { content: 'Snowy.' },
        ]);

        await resolveWeather('Harbin', llm, { dataset });

        expect(llm.calls[1]?.messages.at(-1)?.content).toBe('Harbin: snow, -12°C, north wind');
    });

    it('falls back when the tool call carries malformed arguments', async () => {
        const llm = new ScriptedProvider([toolCall('call_1', { place: 'Guangzhou' })]);

        expect(await resolveWeather('Guangzhou', llm)).toBe('Guangzhou: showers, 30°C, southwest wind force 2');
        expect(llm.calls).toHaveLength(1);
    });

    it('falls back when the remote asks for an unknown tool', async () => {
        const llm = new ScriptedProvider([toolCall('call_1', { location: 'x' }, 'get_real_weather')]);
        expect(await resolveWeather('Atlantis', llm)).toBe('Atlantis: clear, 25°C, light breeze');
    });

    it('returns a blank remote answer as an empty string', async () => {
        const llm = new ScriptedProvider([{ content: '   ' }]);
        expect(await resolveWeather('Chengdu', llm)).toBe('');
    });

    it('logs the agent name and runtime for each remote query', async () => {
        vi.stubEnv('LOG_LEVEL', 'debug');
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        await resolveWeather('Beijing', new ScriptedProvider([{ content: 'Cloudy.' }]));

        expect(spy).toHaveBeenCalledWith('[WeatherResolver] Mock Weather Agent 通过 scripted 发起查询: Beijing');
    });

    it('falls back when the agent exceeds the step limit', async () => {
        const llm = new ScriptedProvider([
            toolCall('call_1', { location: 'a' }),
            toolCall('call_2', { location: 'b' }),
        ]);

        expect(await resolveWeather('Shanghai', llm, { maxSteps: 1 })).toBe(SIMULATED_DATASET.lookup('Shanghai'));
        expect(llm.calls).toHaveLength(1);
    });

    it('sends a blank location to a working remote untouched', async () => {
        const llm = new ScriptedProvider([{ content: 'Please name a location.' }]);
        expect(await resolveWeather('  ', llm)).toBe('Please name a location.');
    });

    it('probes the environment when no client is given', async () => {
        vi.stubEnv('LLM_PROVIDER', 'openai');
        vi.stubEnv('OPENAI_API_KEY', '');

        expect(await resolveWeather('Guangzhou')).toBe(SIMULATED_DATASET.lookup('Guangzhou'));
    });

    it('falls back on any error type from the remote', async () => {
        const llm = new ScriptedProvider([new RemoteUnavailableError('401 Unauthorized')]);
        expect(await resolveWeather('Lagos', llm)).toBe('Lagos: clear, 25°C, light breeze');
    });
});

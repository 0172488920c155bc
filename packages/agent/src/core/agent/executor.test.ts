import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_AGENT_MAX_STEPS } from '../../config/system.js';
import { ScriptedProvider, toolCall } from '../../testing/scripted-provider.js';
import { RemoteUnavailableError } from '../errors.js';
import { AgentExecutor } from './executor.js';
import type { ChatMessage } from '../llm/types.js';
import { SkillRegistry } from '../skills/registry.js';
import { createWeatherSkill } from '../../skills/weather/index.js';
import { WeatherDataset } from '../weather/dataset.js';

function weatherRegistry(): SkillRegistry {
    const registry = new SkillRegistry();
    registry.register(createWeatherSkill(new WeatherDataset({ Kunming: 'Kunming: mild, 19°C, breeze' })));
    return registry;
}

describe('AgentExecutor', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    it('returns the content of a reply without tool calls', async () => {
        const llm = new ScriptedProvider([{ content: 'hello' }]);
        const messages: ChatMessage[] = [{ role: 'user', content: 'hi' }];

        const answer = await new AgentExecutor(llm, weatherRegistry()).execute(messages);

        expect(answer).toBe('hello');
        expect(messages).toEqual([
            { role: 'user', content: 'hi' },
            { role: 'assistant', content: 'hello' },
        ]);
    });

    it('passes registered skills and chat options to the provider', async () => {
        const llm = new ScriptedProvider([{ content: 'ok' }]);

        await new AgentExecutor(llm, weatherRegistry()).execute(
            [{ role: 'user', content: 'hi' }],
            { model: 'test-model', temperature: 0 }
        );

        const options = llm.calls[0]?.options;
        expect(options?.model).toBe('test-model');
        expect(options?.temperature).toBe(0);
        expect(options?.tools?.map(t => t.name)).toEqual(['get_mock_weather']);
        expect(options).not.toHaveProperty('maxSteps');
    });

    it('answers tool calls with outputs keyed by the call id', async () => {
        const llm = new ScriptedProvider([
            toolCall('call_1', { location: 'kunming' }),
            { content: 'It is mild in Kunming.' },
        ]);
        const messages: ChatMessage[] = [{ role: 'user', content: 'Kunming' }];

        const answer = await new AgentExecutor(llm, weatherRegistry()).execute(messages);

        expect(answer).toBe('It is mild in Kunming.');
        expect(llm.calls).toHaveLength(2);
        expect(llm.calls[1]?.messages.slice(1)).toEqual([
            {
                role: 'assistant',
                content: '',
                tool_calls: [{ id: 'call_1', type: 'tool_call', name: 'get_mock_weather', args: { location: 'kunming' } }],
            },
            {
                role: 'tool',
                name: 'get_mock_weather',
                tool_call_id: 'call_1',
                content: 'Kunming: mild, 19°C, breeze',
            },
        ]);
    });

    it('rejects when the model keeps calling tools past maxSteps', async () => {
        const llm = new ScriptedProvider([
            toolCall('call_1', { location: 'a' }),
            toolCall('call_2', { location: 'b' }),
            toolCall('call_3', { location: 'c' }),
        ]);

        await expect(
            new AgentExecutor(llm, weatherRegistry()).execute([{ role: 'user', content: 'loop' }], { maxSteps: 2 })
        ).rejects.toBeInstanceOf(RemoteUnavailableError);
        expect(llm.calls).toHaveLength(2);
    });

    it('propagates malformed tool arguments', async () => {
        const llm = new ScriptedProvider([toolCall('call_1', { city: 'Kunming' })]);

        await expect(
            new AgentExecutor(llm, weatherRegistry()).execute([{ role: 'user', content: 'Kunming' }])
        ).rejects.toThrow('get_mock_weather expects a string "location" argument');
    });

    it('stops after the configured default number of steps', async () => {
        const script = Array.from({ length: DEFAULT_AGENT_MAX_STEPS + 1 }, (_, i) =>
            toolCall(`call_${i}`, { location: 'kunming' })
        );
        const llm = new ScriptedProvider(script);

        await expect(
            new AgentExecutor(llm, weatherRegistry()).execute([{ role: 'user', content: 'loop' }])
        ).rejects.toThrow(`agent did not finish within ${DEFAULT_AGENT_MAX_STEPS} steps`);
        expect(llm.calls).toHaveLength(DEFAULT_AGENT_MAX_STEPS);
    });

    it('logs token usage reported by the provider', async () => {
        vi.stubEnv('LOG_LEVEL', 'debug');
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const llm = new ScriptedProvider([
            { content: 'done', usage: { promptTokens: 12, completionTokens: 3, totalTokens: 15 } },
        ]);

        await new AgentExecutor(llm, weatherRegistry()).execute([{ role: 'user', content: 'hi' }]);

        expect(spy).toHaveBeenCalledWith('[Agent Executor] 本轮 Token 消耗: 15 (prompt 12 / completion 3)');
    });
});

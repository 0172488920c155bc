export { InvalidArgumentError, RemoteUnavailableError } from './core/errors.js';
export { createLogger, type Logger, type LogLevel } from './core/logger.js';
export { loadSysConfig, type SysConfig, type ProviderName } from './config/system.js';

export {
    WeatherDataset,
    SIMULATED_DATASET,
    FALLBACK_DESCRIPTOR,
    normalizeLocation,
    iterAvailableLocations,
} from './core/weather/dataset.js';
export { resolveWeather, type ResolveWeatherOptions } from './core/weather/resolver.js';

export type { ILLMProvider } from './core/llm/interfaces.js';
export type { ChatMessage, ChatOptions, ChatResponse, Role } from './core/llm/types.js';
export { LLMFactory } from './core/llm/factory.js';
export { UnavailableProvider } from './core/llm/unavailable.js';
export { OpenAIProvider, type ChatCompletionsClient, type OpenAIProviderOptions } from './providers/llm/openai/index.js';
export { GLMProvider } from './providers/llm/glm/index.js';

export type { ISkill, ToolCallRequest, SkillArgs } from './core/skills/types.js';
export { SkillRegistry } from './core/skills/registry.js';
export { AgentExecutor, type AgentExecuteOptions } from './core/agent/executor.js';
export { createWeatherAgent, type AgentDefinition } from './core/agent/definition.js';
export { createWeatherSkill, WEATHER_SKILL_NAME } from './skills/weather/index.js';

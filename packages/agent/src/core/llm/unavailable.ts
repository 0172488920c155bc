import { RemoteUnavailableError } from '../errors.js';
import type { ILLMProvider } from './interfaces.js';
import type { ChatResponse } from './types.js';

/**
 * 无法构造真实运行时（缺少 SDK 配置、缺少 API Key）时绑定的占位实现。
 * 任何调用都立即以 RemoteUnavailableError 失败，由 Resolver 统一走本地兜底。
 */
export class UnavailableProvider implements ILLMProvider {
    readonly name = 'unavailable';

    constructor(public readonly reason: string) { }

    async chat(): Promise<ChatResponse> {
        throw new RemoteUnavailableError(this.reason);
    }
}

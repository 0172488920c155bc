/**
 * 调用方自身输入有误（例如空白地点）。这是唯一会穿透 Resolver 抛给调用方的错误。
 */
export class InvalidArgumentError extends Error {
    override readonly name = 'InvalidArgumentError';
}

/**
 * 远端 Agent 运行时不可用：未配置、鉴权失败、网络错误、协议不兼容或工具参数畸形。
 * 只在 Resolver 内部流转，最终一律转化为本地兜底结果。
 */
export class RemoteUnavailableError extends Error {
    override readonly name = 'RemoteUnavailableError';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

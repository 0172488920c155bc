#!/usr/bin/env node
// 优先加载环境变量
import './config/env.js';
import { runCli } from './cli/run.js';

async function main() {
    try {
        process.exitCode = await runCli(process.argv.slice(2));
    } catch (error) {
        console.error('❌ 查询天气时发生未预期的异常:', error);
        process.exitCode = 1;
    }
}

main();

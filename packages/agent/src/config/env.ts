// 负责加载基础的全局 .env，必须在其它模块读取 process.env 之前被 import
import * as dotenv from 'dotenv';
import * as path from 'path';
import { createLogger } from '../core/logger.js';

const log = createLogger('Config');

// 根据运行环境设定读取不同的 .env 文件，文件不存在时静默跳过
const nodeEnv = process.env.NODE_ENV || 'development';
const envFile = `.env.${nodeEnv}`;
const envPath = path.resolve(process.cwd(), envFile);

const loaded = dotenv.config({ path: envPath });
if (loaded.error) {
    log.debug(`未找到环境变量文件 ${envFile}，仅使用进程环境变量`);
} else {
    log.debug(`加载环境变量文件: ${envFile} (Path: ${envPath})`);
}

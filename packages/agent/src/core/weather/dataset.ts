import { InvalidArgumentError } from '../errors.js';

/** 未收录地点统一使用的兜底天气描述 */
export const FALLBACK_DESCRIPTOR = 'clear, 25°C, light breeze';

/**
 * 归一化地点名：去掉首尾空白并做大小写折叠。
 * 对中文等无大小写的文字，折叠不产生任何效果。
 */
export function normalizeLocation(location: string): string {
    return location.trim().toLowerCase();
}

/**
 * 只读的模拟天气表。构造后不可修改，可被任意数量的调用方共享。
 */
export class WeatherDataset {
    private readonly table: ReadonlyMap<string, string>;

    constructor(data: Readonly<Record<string, string>>) {
        const table = new Map<string, string>();
        for (const [label, description] of Object.entries(data)) {
            const key = normalizeLocation(label);
            if (!key) {
                throw new InvalidArgumentError('dataset keys must not be empty');
            }
            if (table.has(key)) {
                throw new InvalidArgumentError(`duplicate dataset key after normalization: "${label}"`);
            }
            table.set(key, description);
        }
        this.table = table;
        Object.freeze(this);
    }

    get size(): number {
        return this.table.size;
    }

    has(location: string): boolean {
        return this.table.has(normalizeLocation(location));
    }

    /**
     * 查询地点天气。收录的地点原样返回表中文本，其余地点返回
     * `"<地点>: <兜底描述>"`，地点保留调用方的原始大小写（仅去首尾空白）。
     */
    lookup(location: string): string {
        const key = normalizeLocation(location);
        if (!key) {
            throw new InvalidArgumentError('location must not be empty');
        }

        const known = this.table.get(key);
        if (known !== undefined) {
            return known;
        }

        return `${location.trim()}: ${FALLBACK_DESCRIPTOR}`;
    }

    /** 按插入顺序遍历已收录的归一化地点名，可重复迭代 */
    locations(): Iterable<string> {
        const table = this.table;
        return {
            [Symbol.iterator]: () => table.keys(),
        };
    }
}

export const SIMULATED_DATASET = new WeatherDataset({
    Beijing: 'Beijing: cloudy, 22°C, northeast wind force 3',
    Shanghai: 'Shanghai: light rain, 28°C, humidity 80%',
    Guangzhou: 'Guangzhou: showers, 30°C, southwest wind force 2',
    Shenzhen: 'Shenzhen: overcast, 29°C, humidity 70%',
    Chengdu: 'Chengdu: light rain, 24°C, west wind force 1',
});

export function iterAvailableLocations(dataset: WeatherDataset = SIMULATED_DATASET): Iterable<string> {
    return dataset.locations();
}

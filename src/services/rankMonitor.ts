import { createHash, randomUUID } from 'crypto';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const LOCATIONS_PATH = path.resolve(__dirname, '../../data/locations.json');

const DAY_MS = 24 * 60 * 60 * 1000;
const REPORT_DAYS = 7;

export type Trend = 'up' | 'down' | 'stable';

export interface Ranking {
    location: string;
    position: number;
    estimated_traffic: number;
    trend: Trend;
    change: number;
}

export interface Monitor {
    id: string;
    domain: string;
    keywords: string[];
    locations: string[];
    createdAt: Date;
    status: 'active';
}

export interface MonitorStore {
    save(monitor: Monitor): Promise<void>;
    get(id: string): Promise<Monitor | null>;
}

/**
 * Monitors kept for the lifetime of one app instance.
 */
export class MemoryMonitorStore implements MonitorStore {
    private readonly monitors = new Map<string, Monitor>();

    async save(monitor: Monitor): Promise<void> {
        this.monitors.set(monitor.id, monitor);
    }

    async get(id: string): Promise<Monitor | null> {
        return this.monitors.get(id) ?? null;
    }
}

export function loadSupportedLocations(file: string = LOCATIONS_PATH): string[] {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    return z.array(z.string().min(1)).parse(raw);
}

/**
 * mulberry32 over a 32-bit seed; returns floats in [0, 1).
 */
function seededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

const TREND_WEIGHTS: ReadonlyArray<[Trend, number]> = [
    ['up', 0.4],
    ['down', 0.3],
    ['stable', 0.3],
];

/**
 * Fake but reproducible ranking for one domain, keyword and location on a
 * given day offset.
 */
export function generateRanking(domain: string, keyword: string, location: string, dayOffset = 0): Ranking {
    const digest = createHash('md5').update(`${domain}:${keyword}:${location}:${dayOffset}`).digest('hex');
    const random = seededRandom(parseInt(digest.slice(0, 8), 16));
    const randInt = (min: number, max: number) => min + Math.floor(random() * (max - min + 1));

    const position = randInt(1, 100);
    const estimatedTraffic = Math.max(10, 5000 - position * 45 + randInt(-200, 200));

    let roll = random();
    let trend: Trend = 'stable';
    for (const [candidate, weight] of TREND_WEIGHTS) {
        if (roll < weight) {
            trend = candidate;
            break;
        }
        roll -= weight;
    }
    const change = trend === 'stable' ? 0 : randInt(1, 8);

    return { location, position, estimated_traffic: estimatedTraffic, trend, change };
}

export type LocationResult = Ranking | { location: string; error: 'Unsupported location' };

export interface DailyRanking extends Ranking {
    date: string;
}

export class RankMonitorService {
    private readonly supported: Set<string>;

    constructor(
        private readonly store: MonitorStore,
        readonly locations: readonly string[] = loadSupportedLocations(),
        private readonly now: () => number = Date.now,
    ) {
        this.supported = new Set(locations);
    }

    public checkRanking(domain: string, keyword: string, locations: string[]): LocationResult[] {
        return locations.map((location) =>
            this.supported.has(location)
                ? generateRanking(domain, keyword, location)
                : { location, error: 'Unsupported location' as const },
        );
    }

    public async createMonitor(domain: string, keywords: string[], locations: string[]): Promise<Monitor> {
        const monitor: Monitor = {
            id: randomUUID().slice(0, 8),
            domain,
            keywords,
            locations,
            createdAt: new Date(this.now()),
            status: 'active',
        };
        await this.store.save(monitor);
        return monitor;
    }

    /**
     * Seven daily points per keyword and location, oldest first. Unknown ids
     * get a demo monitor so the endpoint always has something to show.
     */
    public async report(monitorId: string): Promise<{ domain: string; data: Record<string, Record<string, DailyRanking[]>> }> {
        const monitor = (await this.store.get(monitorId)) ?? {
            domain: 'example.com',
            keywords: ['seo tools', 'rank tracker'],
            locations: ['New York', 'London', 'Tokyo'],
        };

        // fromEntries keeps a `__proto__` keyword as an own key
        const data = Object.fromEntries(
            monitor.keywords.map((keyword): [string, Record<string, DailyRanking[]>] => [
                keyword,
                Object.fromEntries(
                    monitor.locations.map((location): [string, DailyRanking[]] => [
                        location,
                        Array.from({ length: REPORT_DAYS }, (_, day): DailyRanking => ({
                            ...generateRanking(monitor.domain, keyword, location, day),
                            date: new Date(this.now() - (REPORT_DAYS - 1 - day) * DAY_MS).toISOString().slice(0, 10),
                        })),
                    ]),
                ),
            ]),
        );

        return { domain: monitor.domain, data };
    }
}

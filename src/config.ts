import { Redis } from 'ioredis';
import {
	isNumPZ,
	isStrFilled,
} from 'full-utils';
import { ConfigError } from './errors';

export interface RedisStructsConfig {
	url?: string;
	host: string;
	port: number;
	db: number;
	password?: string;
	keyPrefix?: string;
	strictCheckConnection: boolean;
}

const TRUTHY = [ 'true', 'on', 'yes', 'y', '1' ];

export function isTruthy(value: string | undefined): boolean {
	return TRUTHY.includes(String(value ?? '').trim().toLowerCase());
}

function toInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
	const raw = env[name];

	if (raw === undefined || raw.trim() === '') {
		return fallback;
	}
	const value = Number(raw);

	if (!Number.isInteger(value) || !isNumPZ(value)) {
		throw new ConfigError(`Property "${name}" format error.`);
	}
	return value;
}

function toOptional(value: string | undefined): string | undefined {
	return isStrFilled(value)
		? String(value).trim()
		: undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RedisStructsConfig {
	return {
		url: toOptional(env.REDIS_URL),
		host: toOptional(env.REDIS_HOST) ?? '127.0.0.1',
		port: toInteger(env, 'REDIS_PORT', 6379),
		db: toInteger(env, 'REDIS_DB', 0),
		password: toOptional(env.REDIS_PASSWORD),
		keyPrefix: toOptional(env.REDIS_KEY_PREFIX),
		strictCheckConnection: isTruthy(env.REDIS_STRICT_CHECK_CONNECTION),
	};
}

export function createClient(config: RedisStructsConfig): Redis {
	return config.url
		? new Redis(config.url, { db: config.db })
		: new Redis({
			host: config.host,
			port: config.port,
			db: config.db,
			password: config.password,
		});
}

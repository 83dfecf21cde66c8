import type {
	JsonPrimitive,
	Jsonish,
	StructureKind,
	ScriptValue,
	LogEvent,
	LogEventHandler,
	IORedisLike,
} from './types';
import type {
	Storable,
	HandleContext,
} from './DataType';
import type {
	ScriptScope,
	ScriptDefinition,
	AnyScriptDefinition,
} from './Script';
import type { HandleConstructor } from './HandleRegistry';
import type {
	Observer,
	Observable,
} from './Observable';
import type { RedisStructsConfig } from './config';
import type { RedisStructsOptions } from './RedisStructs';
import {
	STRUCTURE_KINDS,
	REFERENCE_PREFIX,
	INLINE_PREFIX,
} from './types';
import { Codec } from './Codec';
import { DataType } from './DataType';
import {
	ScriptRegistry,
	ScriptRunner,
	scriptRegistry,
} from './Script';
import { HandleRegistry } from './HandleRegistry';
import { ObservedValue } from './Observable';
import { RedisString } from './datatypes/RedisString';
import { RedisList } from './datatypes/RedisList';
import { RedisHash } from './datatypes/RedisHash';
import { RedisSet } from './datatypes/RedisSet';
import { RedisSortedSet } from './datatypes/RedisSortedSet';
import { RedisStructs } from './RedisStructs';
import {
	loadConfig,
	createClient,
} from './config';
import {
	StructError,
	ConfigError,
	ConnectionError,
	EncodingError,
	DecodingError,
	DataTypeError,
	IndexError,
	KeyError,
	NotFoundError,
	ScriptArgumentError,
	ScriptExecutionError,
} from './errors';

export type {
	JsonPrimitive,
	Jsonish,
	StructureKind,
	ScriptValue,
	LogEvent,
	LogEventHandler,
	IORedisLike,
	Storable,
	HandleContext,
	ScriptScope,
	ScriptDefinition,
	AnyScriptDefinition,
	HandleConstructor,
	Observer,
	Observable,
	RedisStructsConfig,
	RedisStructsOptions,
};
export {
	STRUCTURE_KINDS,
	REFERENCE_PREFIX,
	INLINE_PREFIX,
	Codec,
	DataType,
	ScriptRegistry,
	ScriptRunner,
	scriptRegistry,
	HandleRegistry,
	ObservedValue,
	RedisString,
	RedisList,
	RedisHash,
	RedisSet,
	RedisSortedSet,
	RedisStructs,
	loadConfig,
	createClient,
	StructError,
	ConfigError,
	ConnectionError,
	EncodingError,
	DecodingError,
	DataTypeError,
	IndexError,
	KeyError,
	NotFoundError,
	ScriptArgumentError,
	ScriptExecutionError,
};

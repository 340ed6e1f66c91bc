import { z } from 'zod';
import {
  CollectReportSchema,
  ConfigSchema,
  ItemSchema,
  NodeIdSchema,
  SessionSchema,
  TestReportSchema,
  WarningSchema
} from './representations';
import type { NodeId } from './NodeId';
import type {
  EngineCollectReport,
  EngineConfig,
  EngineItem,
  EngineSession,
  EngineTestReport,
  EngineWarning
} from '../types/engine';

/**
 * Argument schemas for every message of the protocol, keyed by message name.
 * The key set is the protocol: a frame naming anything else is a violation.
 */
export const MESSAGE_SCHEMAS = {
  init: z.tuple([ConfigSchema]),
  sessionStart: z.tuple([SessionSchema]),
  runTestLoop: z.tuple([]),
  sessionEnd: z.tuple([z.number().int()]),
  unconfigure: z.tuple([]),
  collectionStart: z.tuple([]),
  collectReport: z.tuple([CollectReportSchema]),
  deselectTests: z.tuple([z.array(ItemSchema)]),
  collectionFinish: z.tuple([]),
  startRunPhase: z.tuple([]),
  startTest: z.tuple([NodeIdSchema]),
  testReport: z.tuple([TestReportSchema]),
  endTest: z.tuple([NodeIdSchema]),
  warningRecorded: z.tuple([WarningSchema]),
  internalError: z.tuple([z.string()]),
  keyboardInterrupt: z.tuple([]),
  copyStdout: z.tuple([z.string()]),
  copyStderr: z.tuple([z.string()])
};

export type MessageName = keyof typeof MESSAGE_SCHEMAS;

/** Decoded argument tuple of each message */
export type MessageArgs = { [K in MessageName]: z.infer<(typeof MESSAGE_SCHEMAS)[K]> };

type MessageSchemaTable = { [K in MessageName]: z.ZodType<MessageArgs[K], z.ZodTypeDef, unknown> };

const SCHEMA_TABLE: MessageSchemaTable = MESSAGE_SCHEMAS;

export const MESSAGE_NAMES: ReadonlySet<string> = new Set(Object.keys(MESSAGE_SCHEMAS));

/** Messages that belong to the run phase and are held back until it is confirmed */
export const RUN_PHASE_MESSAGES: ReadonlySet<MessageName> = new Set<MessageName>([
  'startTest',
  'testReport',
  'endTest'
]);

export function isMessageName(name: string): name is MessageName {
  return MESSAGE_NAMES.has(name);
}

export function parseMessageArgs<K extends MessageName>(
  name: K,
  args: unknown[]
): z.SafeParseReturnType<unknown, MessageArgs[K]> {
  return SCHEMA_TABLE[name].safeParse(args);
}

/**
 * A receiver of decoded messages. Each method is optional; a handler
 * implements the ones it cares about.
 */
export type MessageHandler = { [K in MessageName]?: (...args: MessageArgs[K]) => void };

/** Engine-side arguments the emitter accepts for each message */
export interface EmitArgs {
  init: [EngineConfig];
  sessionStart: [EngineSession];
  runTestLoop: [];
  sessionEnd: [number];
  unconfigure: [];
  collectionStart: [];
  collectReport: [EngineCollectReport];
  deselectTests: [EngineItem[]];
  collectionFinish: [];
  startRunPhase: [];
  startTest: [NodeId];
  testReport: [EngineTestReport];
  endTest: [NodeId];
  warningRecorded: [EngineWarning];
  internalError: [string];
  keyboardInterrupt: [];
  copyStdout: [string];
  copyStderr: [string];
}

import { z } from 'zod';
import { NodeId } from './NodeId';

/*
 * Representations are the wire-safe snapshots of engine objects. Each variant
 * carries a `kind` tag and only the attributes declared here. An optional
 * attribute is either present, omitted (absent) or an `unrepresentable`
 * placeholder.
 */

export const UnrepresentableSchema = z.object({
  kind: z.literal('unrepresentable'),
  typeName: z.string(),
  reason: z.string()
});

export const NodeIdSchema = z.instanceof(NodeId);

export const OutcomeSchema = z.enum(['passed', 'failed', 'skipped']);

export const PhaseSchema = z.enum(['setup', 'call', 'teardown']);

export const LocationSchema = z.tuple([z.string(), z.number().nullable(), z.string()]);

const SectionSchema = z.tuple([z.string(), z.string()]);

const LongReprSchema = z.union([z.string(), UnrepresentableSchema]).optional();

export const ItemSchema = z.object({
  kind: z.literal('item'),
  nodeid: NodeIdSchema,
  name: z.string(),
  path: z.string(),
  originalName: z.string().optional(),
  markers: z.array(z.string()),
  location: LocationSchema.optional()
});

export const CollectorSchema = z.object({
  kind: z.literal('collector'),
  nodeid: NodeIdSchema,
  name: z.string(),
  path: z.string(),
  nodeType: z.enum(['file', 'suite'])
});

export const ConfigSchema = z.object({
  kind: z.literal('config'),
  rootPath: z.string(),
  args: z.array(z.string()),
  options: z.record(z.unknown()),
  workerCount: z.number().int()
});

export const SessionSchema = z.object({
  kind: z.literal('session'),
  config: ConfigSchema,
  startTime: z.number()
});

export const CollectReportSchema = z.object({
  kind: z.literal('collect_report'),
  nodeid: NodeIdSchema,
  outcome: OutcomeSchema,
  result: z.array(z.discriminatedUnion('kind', [ItemSchema, CollectorSchema])),
  longrepr: LongReprSchema,
  sections: z.array(SectionSchema)
});

export const TestReportSchema = z.object({
  kind: z.literal('test_report'),
  nodeid: NodeIdSchema,
  when: PhaseSchema,
  outcome: OutcomeSchema,
  duration: z.number(),
  start: z.number(),
  stop: z.number(),
  location: LocationSchema.optional(),
  longrepr: LongReprSchema,
  sections: z.array(SectionSchema),
  wasxfail: z.string().optional(),
  workerId: z.string().optional()
});

export const WarningSchema = z.object({
  kind: z.literal('warning'),
  message: z.string(),
  when: z.enum(['config', 'collect', 'runtest']),
  nodeid: z.string(),
  category: z.string().optional(),
  filename: z.string().optional(),
  lineNumber: z.number().optional()
});

export type UnrepresentableRepresentation = z.infer<typeof UnrepresentableSchema>;
export type ItemRepresentation = z.infer<typeof ItemSchema>;
export type CollectorRepresentation = z.infer<typeof CollectorSchema>;
export type ConfigRepresentation = z.infer<typeof ConfigSchema>;
export type SessionRepresentation = z.infer<typeof SessionSchema>;
export type CollectReportRepresentation = z.infer<typeof CollectReportSchema>;
export type TestReportRepresentation = z.infer<typeof TestReportSchema>;
export type WarningRepresentation = z.infer<typeof WarningSchema>;

export type Representation =
  | UnrepresentableRepresentation
  | ItemRepresentation
  | CollectorRepresentation
  | ConfigRepresentation
  | SessionRepresentation
  | CollectReportRepresentation
  | TestReportRepresentation
  | WarningRepresentation;

export function unrepresentable(typeName: string, reason: string): UnrepresentableRepresentation {
  return { kind: 'unrepresentable', typeName, reason };
}

export function isUnrepresentable(value: unknown): value is UnrepresentableRepresentation {
  return UnrepresentableSchema.safeParse(value).success;
}

/** Text form of a report's failure detail, whichever way it travelled */
export function longReprText(longrepr: string | UnrepresentableRepresentation | undefined): string | undefined {
  if (longrepr === undefined || typeof longrepr === 'string') {
    return longrepr;
  }
  return `<unrepresentable ${longrepr.typeName}: ${longrepr.reason}>`;
}

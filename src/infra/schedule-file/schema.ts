import Ajv2020 from 'ajv/dist/2020.js';
import { SchedulerError, TIME_SCALES } from '../../scheduler/index.js';
import type { ScheduleFile, ScheduleFileIssue } from './types.js';

const TIME_SCALE_SCHEMA = { type: 'string', enum: [...TIME_SCALES] };
const COUNT_SCHEMA = { type: 'integer', minimum: 0 };
const NODE_SCHEMA = { type: 'string', minLength: 1 };

export const SCHEDULE_FILE_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://tickgraph.dev/schemas/schedule.schema.json',
  title: 'Tickgraph Schedule',
  description: 'Nodes, dependencies and conditions for one scheduler',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    nodes: { type: 'array', items: NODE_SCHEMA, uniqueItems: true },
    dependencies: {
      type: 'object',
      additionalProperties: { type: 'array', items: NODE_SCHEMA },
    },
    conditions: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/Condition' },
    },
    termination: {
      type: 'object',
      propertyNames: TIME_SCALE_SCHEMA,
      additionalProperties: {
        oneOf: [{ $ref: '#/$defs/Condition' }, { type: 'null' }],
      },
    },
  },
  additionalProperties: false,
  anyOf: [{ required: ['nodes'] }, { required: ['dependencies'] }],
  $defs: {
    Condition: {
      oneOf: [
        { $ref: '#/$defs/Constant' },
        { $ref: '#/$defs/PassCondition' },
        { $ref: '#/$defs/TrialCondition' },
        { $ref: '#/$defs/EveryNCalls' },
        { $ref: '#/$defs/CallCount' },
        { $ref: '#/$defs/AllHaveRun' },
        { $ref: '#/$defs/Composite' },
        { $ref: '#/$defs/NOf' },
        { $ref: '#/$defs/Not' },
      ],
    },
    Constant: {
      type: 'object',
      required: ['type'],
      properties: { type: { enum: ['Always', 'Never'] } },
      additionalProperties: false,
    },
    PassCondition: {
      type: 'object',
      required: ['type', 'n'],
      properties: {
        type: { enum: ['AtPass', 'BeforePass', 'AfterPass', 'AfterNPasses', 'EveryNPasses'] },
        n: COUNT_SCHEMA,
        timeScale: TIME_SCALE_SCHEMA,
      },
      additionalProperties: false,
    },
    TrialCondition: {
      type: 'object',
      required: ['type', 'n'],
      properties: {
        type: { enum: ['AtTrial', 'AfterNTrials'] },
        n: COUNT_SCHEMA,
      },
      additionalProperties: false,
    },
    EveryNCalls: {
      type: 'object',
      required: ['type', 'node', 'n'],
      properties: {
        type: { const: 'EveryNCalls' },
        node: NODE_SCHEMA,
        n: COUNT_SCHEMA,
      },
      additionalProperties: false,
    },
    CallCount: {
      type: 'object',
      required: ['type', 'node', 'n'],
      properties: {
        type: { enum: ['AfterNCalls', 'AtNCalls', 'BeforeNCalls'] },
        node: NODE_SCHEMA,
        n: COUNT_SCHEMA,
        timeScale: TIME_SCALE_SCHEMA,
      },
      additionalProperties: false,
    },
    AllHaveRun: {
      type: 'object',
      required: ['type'],
      properties: {
        type: { const: 'AllHaveRun' },
        nodes: { type: 'array', items: NODE_SCHEMA },
        timeScale: TIME_SCALE_SCHEMA,
      },
      additionalProperties: false,
    },
    Composite: {
      type: 'object',
      required: ['type', 'conditions'],
      properties: {
        type: { enum: ['All', 'Any'] },
        conditions: { type: 'array', items: { $ref: '#/$defs/Condition' } },
      },
      additionalProperties: false,
    },
    NOf: {
      type: 'object',
      required: ['type', 'n', 'conditions'],
      properties: {
        type: { const: 'NOf' },
        n: COUNT_SCHEMA,
        conditions: { type: 'array', items: { $ref: '#/$defs/Condition' } },
      },
      additionalProperties: false,
    },
    Not: {
      type: 'object',
      required: ['type', 'condition'],
      properties: {
        type: { const: 'Not' },
        condition: { $ref: '#/$defs/Condition' },
      },
      additionalProperties: false,
    },
  },
};

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateScheduleFileSchema = ajv.compile<ScheduleFile>(SCHEDULE_FILE_SCHEMA);

/**
 * Check a parsed document against the schedule schema.
 * @throws SchedulerError (INVALID_SCHEDULE_FILE) listing every issue
 */
export function validateScheduleFile(document: unknown): ScheduleFile {
  if (validateScheduleFileSchema(document)) {
    return document;
  }

  const issues: ScheduleFileIssue[] = (validateScheduleFileSchema.errors ?? []).map((error) => ({
    path: error.instancePath || '/',
    message: error.message ?? 'is invalid',
  }));
  throw SchedulerError.invalidScheduleFile(
    issues.map((issue) => `${issue.path} ${issue.message}`).join('; '),
    issues
  );
}

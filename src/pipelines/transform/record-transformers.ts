import { Logger } from '@nestjs/common';
import { TransformationError } from '../../common/errors';
import { DataRecord, RunContext, Transformer } from '../stages/stage.interface';

/** Maps one record. Return `null` to drop it, throw `TransformationError` to drop and report it. */
export type RecordMapper<I, O> = (record: I, ctx: RunContext) => O | null;

const logger = new Logger('RecordTransformers');

/**
 * Applies `mapper` to each record. Records the mapper rejects are dropped
 * and counted; any other error fails the whole stage.
 */
export function createRecordTransformer<I, O>(
  mapper: RecordMapper<I, O>,
  name: string,
): Transformer<I, O> {
  return {
    kind: 'transformer',
    name,
    async transform(records, ctx) {
      const output: O[] = [];
      let filtered = 0;
      const rejected: string[] = [];

      records.forEach((record, index) => {
        try {
          const mapped = mapper(record, ctx);
          if (mapped === null) {
            filtered += 1;
          } else {
            output.push(mapped);
          }
        } catch (err) {
          if (!(err instanceof TransformationError)) throw err;
          rejected.push(`#${index}: ${err.message}`);
        }
      });

      if (rejected.length > 0) {
        logger.warn(
          `${name}: dropped ${rejected.length} of ${records.length} records, first: ${rejected[0]}`,
        );
      }
      if (filtered > 0) {
        logger.debug(`${name}: filtered out ${filtered} of ${records.length} records`);
      }
      return output;
    },
  };
}

/** Runs transformers one after another, feeding each the previous output. */
export function createChainTransformer(
  steps: Transformer<DataRecord, DataRecord>[],
  name = steps.map((step) => step.name).join('+'),
): Transformer<DataRecord, DataRecord> {
  return {
    kind: 'transformer',
    name,
    async transform(records, ctx) {
      let current = records;
      for (const step of steps) {
        if (current.length === 0) break;
        current = await step.transform(current, ctx);
      }
      return current;
    },
  };
}

export function composeMappers(
  ...mappers: RecordMapper<DataRecord, DataRecord>[]
): RecordMapper<DataRecord, DataRecord> {
  return (record, ctx) => {
    let current: DataRecord | null = record;
    for (const mapper of mappers) {
      if (current === null) return null;
      current = mapper(current, ctx);
    }
    return current;
  };
}

export function selectFields(fields: string[]): RecordMapper<DataRecord, DataRecord> {
  return (record) => {
    const selected: DataRecord = {};
    for (const field of fields) {
      if (field in record) selected[field] = record[field];
    }
    return selected;
  };
}

export function renameFields(
  mapping: Record<string, string>,
): RecordMapper<DataRecord, DataRecord> {
  return (record) => {
    const renamed: DataRecord = {};
    for (const [key, value] of Object.entries(record)) {
      renamed[mapping[key] ?? key] = value;
    }
    return renamed;
  };
}

export function requireFields(fields: string[]): RecordMapper<DataRecord, DataRecord> {
  return (record) => {
    const missing = fields.filter((field) => {
      const value = record[field];
      return value === null || value === undefined || value === '';
    });
    if (missing.length > 0) {
      throw new TransformationError(`missing ${missing.join(', ')}`, {
        fields: missing.join(','),
      });
    }
    return record;
  };
}

export function addProcessedAt(
  column = 'processed_at',
  now: () => Date = () => new Date(),
): RecordMapper<DataRecord, DataRecord> {
  return (record) => ({ ...record, [column]: now() });
}

import { z } from 'zod';
import { GenerationStateError } from '../engine/errors';
import type { Generation } from '../engine/types';

const timeValue = z.union([z.string().min(1), z.number().finite(), z.date()]);

/**
 * Shape of a generation record as the native API returns it. The native side
 * has used both `id`/`timestamp` and `number`/`date`, so both spellings are
 * listed here and resolved explicitly below.
 */
const NativeGenerationRecord = z.object({
  id: z.number().int().positive().optional(),
  number: z.number().int().positive().optional(),
  timestamp: timeValue.optional(),
  date: timeValue.optional(),
  current: z.boolean().optional(),
  description: z.string().nullable().optional(),
});

/** Parses `2024-01-05 12:30:01`, ISO strings, epoch seconds or a Date */
export function toTimestamp(value: string | number | Date): Date {
  let parsed: Date;
  if (value instanceof Date) {
    parsed = new Date(value.getTime());
  } else if (typeof value === 'number') {
    parsed = new Date(value * 1000);
  } else {
    parsed = new Date(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}(:\d{2})?$/.test(value) ? value.replace(' ', 'T') : value);
  }

  if (Number.isNaN(parsed.getTime())) {
    throw new GenerationStateError(`Unreadable generation timestamp: ${String(value)}`);
  }
  return parsed;
}

/** The one place a native generation record becomes a Generation */
export function mapNativeGeneration(record: unknown): Generation {
  const result = NativeGenerationRecord.safeParse(record);
  if (!result.success) {
    throw new GenerationStateError(`Malformed generation record: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
  }

  const fields = result.data;
  const id = fields.id ?? fields.number;
  if (id === undefined) {
    throw new GenerationStateError('Generation record has no id');
  }

  const time = fields.timestamp ?? fields.date;
  if (time === undefined) {
    throw new GenerationStateError(`Generation ${id} has no timestamp`);
  }

  return {
    id,
    timestamp: toTimestamp(time),
    current: fields.current ?? false,
    description: fields.description ?? null,
  };
}

import { z } from 'zod';
import type { LayerEntry, LayerRecord, StoreSnapshot } from '../../types';

const layerEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('value'), value: z.unknown() }),
  z.object({ kind: z.literal('tombstone') }),
]);

// z.record() drops a "__proto__" key while copying, so records are only
// checked for being plain objects here and their entries are walked with
// Object.entries() below.
const keyedRecordSchema = z.custom<Record<string, unknown>>(
  (data) => typeof data === 'object' && data !== null && !Array.isArray(data),
  { message: 'Expected an object keyed by store key' },
);

/**
 * Structural shape of a snapshot. Stored values and layer entries are left
 * unparsed here and checked afterwards, entry by entry.
 */
export const snapshotShapeSchema = z.object({
  base: keyedRecordSchema,
  layers: z.array(keyedRecordSchema),
  label: z.string().optional(),
  createdAt: z.number().int().nonnegative(),
});

/**
 * Validates untrusted data (e.g. a snapshot that went through JSON) and
 * returns a typed snapshot. Every stored value, in the base mapping and in
 * every layer, is parsed with `valueSchema`.
 *
 * Throws a ZodError whose issue paths point into the snapshot
 * (e.g. `['layers', 0, 'user', 'value', 'age']`).
 */
export function parseSnapshot<V>(
  valueSchema: z.ZodType<V, z.ZodTypeDef, unknown>,
  data: unknown,
): StoreSnapshot<V> {
  const shape = snapshotShapeSchema.parse(data);

  const base = Object.fromEntries(
    Object.entries(shape.base).map(([key, value]): [string, V] => [
      key,
      valueSchema.parse(value, { path: ['base', key] }),
    ]),
  );

  const layers = shape.layers.map((layer, index): LayerRecord<V> =>
    Object.fromEntries(
      Object.entries(layer).map(([key, raw]): [string, LayerEntry<V>] => {
        const entry = layerEntrySchema.parse(raw, { path: ['layers', index, key] });
        if (entry.kind === 'tombstone') return [key, { kind: 'tombstone' }];
        const value = valueSchema.parse(entry.value, { path: ['layers', index, key, 'value'] });
        return [key, { kind: 'value', value }];
      }),
    ),
  );

  return {
    base,
    layers,
    label: shape.label,
    createdAt: shape.createdAt,
  };
}

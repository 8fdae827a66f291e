import { z } from 'zod';

// provider のペイロードは形が揺れるため、項目単位で既定値に落とす

export const optionalNumber = z
  .preprocess((v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v), z.number().finite().optional())
  .catch(undefined);

export const optionalText = z
  .preprocess((v) => (typeof v === 'number' ? String(v) : v), z.string().trim().optional())
  .catch(undefined);

export const text = z
  .preprocess((v) => (typeof v === 'number' ? String(v) : v), z.string().trim())
  .catch('');

// 1要素の不正で配列全体を捨てない
export function lenientArray<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((arr) => {
      const out: Array<z.output<T>> = [];
      for (const x of arr) {
        const r = item.safeParse(x);
        if (r.success) out.push(r.data);
      }
      return out;
    });
}

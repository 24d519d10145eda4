import { z } from 'zod';

// Row ids are Postgres INTEGER columns; values past these bounds make the
// query itself fail instead of matching nothing.
const PG_INT_MIN = -2147483648;
const PG_INT_MAX = 2147483647;

/** Any integer a lookup can run with. Unknown ids fall through to a 404. */
export const rowId = z.number().int().min(PG_INT_MIN).max(PG_INT_MAX);

export const idParamsSchema = z.object({
  id: z.coerce.number().pipe(rowId),
});

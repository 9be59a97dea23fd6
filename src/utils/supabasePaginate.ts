interface PageResult<T> {
  data: T[] | null;
  error: { message: string } | null;
}

/**
 * Fetches all rows from a Supabase/PostgREST query by paginating with .range().
 *
 * PostgREST silently caps results at 1000 rows. This utility loops until all
 * rows are fetched. For the common case (<1000 rows) it's a single round-trip.
 *
 * @param queryFactory - Returns a fresh query builder; called once per page.
 * @param pageSize     - Rows per page (default 1000, the PostgREST default limit).
 */
export async function fetchAllPages<T>(
  queryFactory: () => {
    range: (from: number, to: number) => PromiseLike<PageResult<T>>;
  },
  pageSize: number = 1000
): Promise<T[]> {
  const allRows: T[] = [];
  let offset = 0;

  while (true) {
    const { data, error } = await queryFactory().range(
      offset,
      offset + pageSize - 1
    );

    if (error) throw error;

    const rows = data ?? [];
    allRows.push(...rows);

    if (rows.length < pageSize) break;
    offset += pageSize;
  }

  return allRows;
}

export interface CursorPage<TRecord, TCursor> {
  records: TRecord[];
  next: TCursor | null;
}

export interface OffsetPage<TRecord> {
  records: TRecord[];
  total: number;
}

/**
 * Walks a server-driven cursor until the server stops returning one or
 * `maxPages` pages have been fetched.
 */
export async function followCursor<TRecord, TCursor>(
  initial: TCursor,
  maxPages: number,
  fetchPage: (cursor: TCursor, pageIndex: number) => Promise<CursorPage<TRecord, TCursor>>
): Promise<TRecord[]> {
  const all: TRecord[] = [];
  let cursor = initial;

  for (let pageIndex = 0; pageIndex < maxPages; pageIndex += 1) {
    const page = await fetchPage(cursor, pageIndex);
    all.push(...page.records);

    if (page.next === null) {
      break;
    }
    cursor = page.next;
  }

  return all;
}

/**
 * Walks offset/limit pages until `offset + pageSize >= total` or a page is empty.
 * Without `maxPages` the loop trusts the server-reported total.
 */
export async function countOffset<TRecord>(
  pageSize: number,
  fetchPage: (offset: number, limit: number) => Promise<OffsetPage<TRecord>>,
  maxPages?: number
): Promise<TRecord[]> {
  const all: TRecord[] = [];
  let offset = 0;
  let pages = 0;

  for (;;) {
    const page = await fetchPage(offset, pageSize);
    all.push(...page.records);
    pages += 1;

    if (offset + pageSize >= page.total || page.records.length === 0) {
      break;
    }
    if (maxPages !== undefined && pages >= maxPages) {
      break;
    }

    offset += pageSize;
  }

  return all;
}

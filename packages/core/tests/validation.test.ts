import { describe, expect, it } from 'vitest';
import { parseCatalogRow, rowIdSchema } from '../src/validation/schemas.js';

describe('parseCatalogRow', () => {
  const table = {
    name: 'agolitems',
    idColumn: 'id',
    keyColumn: 'tablename',
    linkColumn: 'open_data_link',
  };

  it('reads NULL key and link as empty text', () => {
    const result = parseCatalogRow({ id: 4, tablename: null, open_data_link: null }, table);

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ id: 4, sourceTableName: '', openDataLink: '' });
  });

  it('rejects a row without an id', () => {
    const result = parseCatalogRow({ tablename: 'Parks', open_data_link: 'x' }, table);

    expect(result.success).toBe(false);
  });

  it('rejects a blank text id', () => {
    const result = parseCatalogRow({ id: '  ', tablename: 'Parks', open_data_link: 'x' }, table);

    expect(result.success).toBe(false);
  });

  it('keeps a text id exactly as stored', () => {
    const result = parseCatalogRow({ id: ' A-17 ', tablename: 'Parks', open_data_link: '' }, table);

    expect(result.success).toBe(true);
    expect(result.data?.id).toBe(' A-17 ');
  });

  it('accepts a BIGINT id read as a string', () => {
    const result = parseCatalogRow(
      { id: '9007199254740993', tablename: 'Parks', open_data_link: '' },
      table
    );

    expect(result.data?.id).toBe('9007199254740993');
  });
});

describe('rowIdSchema', () => {
  it('rejects integers past the safe range', () => {
    expect(rowIdSchema.safeParse(Number.MAX_SAFE_INTEGER).success).toBe(true);
    expect(rowIdSchema.safeParse(Number.MAX_SAFE_INTEGER + 1).success).toBe(false);
  });

  it('rejects fractional ids', () => {
    expect(rowIdSchema.safeParse(1.5).success).toBe(false);
  });
});

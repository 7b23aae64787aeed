/**
 * Tests for the row exporters and their registry.
 */

import { XMLParser } from 'fast-xml-parser';
import { describe, expect, it } from 'vitest';
import {
  buildCopySql,
  ConfigurationError,
  CopyError,
  CsvExporter,
  CursorError,
  createExportOptions,
  DuplicateFormatError,
  encodeCsvField,
  escapeXml,
  ExporterRegistry,
  FORMAT_NAMES,
  isCopyCapable,
  JsonExporter,
  NoopLogger,
  registerDefaultExporters,
  RowExportError,
  SqlExporter,
  TypeOid,
  UnsupportedFormatError,
  XmlExporter,
  YamlExporter,
  type ExporterContext,
  type ExportOptionsInput,
} from '../index.js';
import { ArrayCursor, FakeCopySource, field, memorySinkFactory } from '../testing/index.js';

const instant = new Date(Date.UTC(2024, 0, 15, 13, 45, 30));

function setup(sinkOptions: { failOnWrite?: number } = {}) {
  const sinks = memorySinkFactory(sinkOptions);
  const context: ExporterContext = { logger: new NoopLogger(), createSink: sinks };
  return { sinks, context };
}

function options(input: Partial<ExportOptionsInput> & Pick<ExportOptionsInput, 'format'>) {
  return createExportOptions({ outputPath: `out.${input.format}`, ...input });
}

// ============================================================================
// Registry
// ============================================================================

describe('ExporterRegistry', () => {
  it('should register the default formats', () => {
    const registry = registerDefaultExporters(new ExporterRegistry());

    expect(registry.list()).toEqual(['csv', 'json', 'sql', 'template', 'xlsx', 'xml', 'yaml']);
    expect(registry.list()).toEqual([...FORMAT_NAMES].sort());
    expect(registry.has(' JSON ')).toBe(true);
  });

  it('should build a fresh exporter per call', () => {
    const registry = registerDefaultExporters(new ExporterRegistry());
    const { context } = setup();

    const first = registry.get('csv', context);
    const second = registry.get(' CSV ', context);
    expect(first.format).toBe('csv');
    expect(first).not.toBe(second);
  });

  it('should reject duplicate names', () => {
    const registry = new ExporterRegistry();
    registry.register('csv', context => new CsvExporter(context));

    expect(() => registry.register(' CSV ', context => new CsvExporter(context))).toThrow(DuplicateFormatError);
    expect(() => registry.register(' CSV ', context => new CsvExporter(context))).toThrow(
      'format "csv" already registered'
    );
  });

  it('should list the available formats for unknown names', () => {
    const registry = registerDefaultExporters(new ExporterRegistry());
    const { context } = setup();

    expect(() => registry.get('nope', context)).toThrow(UnsupportedFormatError);
    expect(() => registry.get('nope', context)).toThrow(
      'unsupported format: "nope" (available: csv, json, sql, template, xlsx, xml, yaml)'
    );
  });

  it('should report COPY support', () => {
    const { context } = setup();

    expect(isCopyCapable(new CsvExporter(context))).toBe(true);
    expect(isCopyCapable(new JsonExporter(context))).toBe(false);
  });
});

// ============================================================================
// Shared row loop
// ============================================================================

describe('BaseExporter', () => {
  const fields = [field('id', TypeOid.Int4), field('name', TypeOid.Text)];
  const rows = [
    [1, 'a'],
    [2, 'b'],
    [3, 'c'],
  ];

  it('should open the sink with the requested path, compression and format', async () => {
    const { sinks, context } = setup();

    await new CsvExporter(context).export(
      new ArrayCursor(fields, rows),
      options({ format: 'csv', outputPath: 'users.csv', compression: 'gzip' })
    );

    expect(sinks.configs).toEqual([{ path: 'users.csv', compression: 'gzip', format: 'csv' }]);
    expect(sinks.sinks[0].closeCount).toBe(1);
  });

  it('should wrap write failures with the row index and close once', async () => {
    const { sinks, context } = setup({ failOnWrite: 2 });

    const error = await new JsonExporter(context)
      .export(new ArrayCursor(fields, rows), options({ format: 'json' }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RowExportError);
    expect(error instanceof RowExportError && error.rowIndex).toBe(1);
    expect(error instanceof Error && error.message).toBe('error writing row 1: write 2 failed');
    expect(sinks.sinks[0].closeCount).toBe(1);
  });

  it('should wrap cursor failures and close once', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, rows, { failAt: { row: 2, error: new Error('fetch failed') } });

    const error = await new CsvExporter(context).export(cursor, options({ format: 'csv' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CursorError);
    expect(error instanceof Error && error.message).toBe('error iterating rows: fetch failed');
    expect(sinks.sinks[0].closeCount).toBe(1);
  });

  it('should fail on a terminal cursor error after the last row', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, rows, { terminalError: new Error('connection reset') });

    await expect(new JsonExporter(context).export(cursor, options({ format: 'json' }))).rejects.toThrow(
      'error iterating rows: connection reset'
    );
    expect(sinks.sinks[0].closeCount).toBe(1);
  });

  it('should report progress through the context callback', async () => {
    const { sinks } = setup();
    const reports: number[] = [];
    let t = 0;
    const exporter = new CsvExporter({
      logger: new NoopLogger(),
      createSink: sinks,
      onProgress: count => reports.push(count),
      clock: () => new Date((t += 3000)),
    });

    const count = await exporter.export(new ArrayCursor(fields, rows), options({ format: 'csv' }));

    expect(count).toBe(3);
    expect(reports).toEqual([1, 2, 3, 3]);
    expect(sinks.sinks[0].text()).toBe('id,name\n1,a\n2,b\n3,c\n');
  });

  describe('column order', () => {
    const permuted = [field('c', TypeOid.Int4), field('a', TypeOid.Int4), field('b', TypeOid.Int4)];
    const values = [[3, 1, 2]];

    it('should follow the cursor in CSV', async () => {
      const { sinks, context } = setup();
      await new CsvExporter(context).export(new ArrayCursor(permuted, values), options({ format: 'csv' }));
      expect(sinks.sinks[0].text()).toBe('c,a,b\n3,1,2\n');
    });

    it('should follow the cursor in JSON', async () => {
      const { sinks, context } = setup();
      await new JsonExporter(context).export(new ArrayCursor(permuted, values), options({ format: 'json' }));
      expect(sinks.sinks[0].text()).toBe('[\n  {\n    "c": 3,\n    "a": 1,\n    "b": 2\n  }\n]\n');
    });

    it('should follow the cursor in XML', async () => {
      const { sinks, context } = setup();
      await new XmlExporter(context).export(new ArrayCursor(permuted, values), options({ format: 'xml' }));
      expect(sinks.sinks[0].text()).toContain('  <row><c>3</c><a>1</a><b>2</b></row>\n');
    });

    it('should follow the cursor in YAML', async () => {
      const { sinks, context } = setup();
      await new YamlExporter(context).export(new ArrayCursor(permuted, values), options({ format: 'yaml' }));
      expect(sinks.sinks[0].text()).toBe('- c: 3\n  a: 1\n  b: 2\n');
    });

    it('should keep integer-like names in place in XML', async () => {
      const { sinks, context } = setup();
      await new XmlExporter(context).export(
        new ArrayCursor([field('name', TypeOid.Text), field('2024', TypeOid.Int4), field('1', TypeOid.Int4)], [
          ['x', 7, 8],
        ]),
        options({ format: 'xml' })
      );
      expect(sinks.sinks[0].text()).toContain('  <row><name>x</name><2024>7</2024><1>8</1></row>\n');
    });

    it('should follow the cursor in SQL', async () => {
      const { sinks, context } = setup();
      await new SqlExporter(context).export(
        new ArrayCursor(permuted, values),
        options({ format: 'sql', insertTable: 't' })
      );
      expect(sinks.sinks[0].text()).toBe('INSERT INTO "t" ("c", "a", "b") VALUES\n\t(3, 1, 2);\n');
    });
  });
});

// ============================================================================
// CSV
// ============================================================================

describe('CsvExporter', () => {
  const fields = [
    field('id', TypeOid.Int4),
    field('name', TypeOid.Text),
    field('note', TypeOid.Text),
    field('created', TypeOid.Timestamp),
  ];

  it('should quote fields that need it', () => {
    expect(encodeCsvField('plain', ',')).toBe('plain');
    expect(encodeCsvField('', ',')).toBe('');
    expect(encodeCsvField('a,b', ',')).toBe('"a,b"');
    expect(encodeCsvField('a,b', ';')).toBe('a,b');
    expect(encodeCsvField('say "hi"', ',')).toBe('"say ""hi"""');
    expect(encodeCsvField(' lead', ',')).toBe('" lead"');
    expect(encodeCsvField('\\.', ',')).toBe('"\\."');
    expect(encodeCsvField('a\r\nb', ',')).toBe('"a\r\nb"');
  });

  it('should write a header and one line per row', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, [
      [1, 'Alice', 'has, comma', instant],
      [2, null, 'say "hi"', null],
      [3, ' lead', 'line\nbreak', instant],
    ]);

    const count = await new CsvExporter(context).export(cursor, options({ format: 'csv' }));

    expect(count).toBe(3);
    expect(sinks.sinks[0].text()).toBe(
      'id,name,note,created\n' +
        '1,Alice,"has, comma",2024-01-15 13:45:30\n' +
        '2,,"say ""hi""",\n' +
        '3," lead","line\nbreak",2024-01-15 13:45:30\n'
    );
  });

  it('should honour the delimiter and skip the header', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor([field('a', TypeOid.Text), field('b', TypeOid.Text)], [['a;b', '\\.']]);

    await new CsvExporter(context).export(cursor, options({ format: 'csv', delimiter: ';', noHeader: true }));

    expect(sinks.sinks[0].text()).toBe('"a;b";"\\."\n');
  });

  it('should write only the header for an empty result', async () => {
    const { sinks, context } = setup();

    const count = await new CsvExporter(context).export(new ArrayCursor(fields, []), options({ format: 'csv' }));

    expect(count).toBe(0);
    expect(sinks.sinks[0].text()).toBe('id,name,note,created\n');
  });

  describe('COPY', () => {
    it('should build the COPY statement', () => {
      expect(buildCopySql(' SELECT id, name FROM users; ', { noHeader: false, delimiter: ',' })).toBe(
        "COPY (SELECT id, name FROM users) TO STDOUT WITH (FORMAT csv, HEADER true, DELIMITER ',')"
      );
      expect(buildCopySql('SELECT 1', { noHeader: true, delimiter: '\t' })).toBe(
        "COPY (SELECT 1) TO STDOUT WITH (FORMAT csv, HEADER false, DELIMITER '\t')"
      );
    });

    it('should stream server output into the sink', async () => {
      const { sinks, context } = setup();
      const source = new FakeCopySource(['id,name\n', '1,a\n'], 1);

      const count = await new CsvExporter(context).exportCopy(
        source,
        'SELECT id, name FROM users;',
        options({ format: 'csv' })
      );

      expect(count).toBe(1);
      expect(source.statements).toEqual([
        "COPY (SELECT id, name FROM users) TO STDOUT WITH (FORMAT csv, HEADER true, DELIMITER ',')",
      ]);
      expect(sinks.sinks[0].text()).toBe('id,name\n1,a\n');
      expect(sinks.sinks[0].closeCount).toBe(1);
    });

    it('should wrap server failures', async () => {
      const { sinks, context } = setup();
      const source = new FakeCopySource(['id\n'], 0, new Error('boom'));

      const error = await new CsvExporter(context)
        .exportCopy(source, 'SELECT id FROM t', options({ format: 'csv' }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CopyError);
      expect(error instanceof Error && error.message).toBe('COPY TO STDOUT failed: boom');
      expect(sinks.sinks[0].closeCount).toBe(1);
    });
  });
});

// ============================================================================
// JSON
// ============================================================================

describe('JsonExporter', () => {
  const fields = [
    field('id', TypeOid.Int4),
    field('name', TypeOid.Text),
    field('meta', TypeOid.Jsonb),
    field('big', TypeOid.Int8),
  ];

  it('should stream an indented array', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, [
      [1, 'Alice', { tags: ['a'] }, '9007199254740993'],
      [2, null, null, null],
    ]);

    await new JsonExporter(context).export(cursor, options({ format: 'json' }));

    expect(sinks.sinks[0].text()).toBe(
      '[\n' +
        '  {\n    "id": 1,\n    "name": "Alice",\n    "meta": {\n      "tags": [\n        "a"\n      ]\n    },\n    "big": 9007199254740993\n  },\n' +
        '  {\n    "id": 2,\n    "name": null,\n    "meta": null,\n    "big": null\n  }\n' +
        ']\n'
    );
  });

  it('should write an empty array for an empty result', async () => {
    const { sinks, context } = setup();

    await new JsonExporter(context).export(new ArrayCursor(fields, []), options({ format: 'json' }));

    expect(sinks.sinks[0].text()).toBe('[\n\n]\n');
  });
});

// ============================================================================
// XML
// ============================================================================

describe('XmlExporter', () => {
  const fields = [
    field('id', TypeOid.Int4),
    field('name', TypeOid.Text),
    field('doc', TypeOid.Json),
    field('note', TypeOid.Text),
  ];

  it('should escape the five special characters', () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;');
  });

  it('should write one line per row', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, [
      [1, 'A & B', { k: 'v' }, ''],
      [2, null, null, '<x>'],
    ]);

    const count = await new XmlExporter(context).export(cursor, options({ format: 'xml' }));

    expect(count).toBe(2);
    expect(sinks.sinks[0].text()).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        '<results>\n' +
        '  <row><id>1</id><name>A &amp; B</name><doc>{"k":"v"}</doc><note></note></row>\n' +
        '  <row><id>2</id><name></name><doc></doc><note>&lt;x&gt;</note></row>\n' +
        '</results>\n'
    );
  });

  it('should write reserved-looking column names as plain elements', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(
      [field('#text', TypeOid.Text), field('@_id', TypeOid.Int4), field('n', TypeOid.Int4)],
      [['a', 1, 2]]
    );

    await new XmlExporter(context).export(cursor, options({ format: 'xml' }));

    expect(sinks.sinks[0].text()).toContain('  <row><#text>a</#text><@_id>1</@_id><n>2</n></row>\n');
  });

  it('should produce a document that parses back', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor([field('id', TypeOid.Int4), field('name', TypeOid.Text)], [
      [1, 'Tom & Jerry'],
      [2, 'x<y'],
    ]);

    await new XmlExporter(context).export(
      cursor,
      options({ format: 'xml', xmlRootElement: 'items', xmlRowElement: 'item' })
    );

    const parsed: unknown = new XMLParser({ parseTagValue: false }).parse(sinks.sinks[0].text());
    expect(parsed).toMatchObject({
      items: {
        item: [
          { id: '1', name: 'Tom & Jerry' },
          { id: '2', name: 'x<y' },
        ],
      },
    });
  });

  it('should write an empty root for an empty result', async () => {
    const { sinks, context } = setup();

    await new XmlExporter(context).export(
      new ArrayCursor(fields, []),
      options({ format: 'xml', xmlRootElement: 'items', xmlRowElement: 'item' })
    );

    expect(sinks.sinks[0].text()).toBe('<?xml version="1.0" encoding="UTF-8"?>\n<items>\n</items>\n');
  });
});

// ============================================================================
// YAML
// ============================================================================

describe('YamlExporter', () => {
  const fields = [field('id', TypeOid.Int4), field('name', TypeOid.Text), field('active', TypeOid.Bool)];

  it('should write a sequence of mappings', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, [
      [1, 'Alice', true],
      [2, null, false],
    ]);

    await new YamlExporter(context).export(cursor, options({ format: 'yaml' }));

    expect(sinks.sinks[0].text()).toBe('- id: 1\n  name: Alice\n  active: true\n- id: 2\n  name: null\n  active: false\n');
  });

  it('should write [] for an empty result', async () => {
    const { sinks, context } = setup();

    await new YamlExporter(context).export(new ArrayCursor(fields, []), options({ format: 'yaml' }));

    expect(sinks.sinks[0].text()).toBe('[]\n');
  });
});

// ============================================================================
// SQL
// ============================================================================

describe('SqlExporter', () => {
  const fields = [field('id', TypeOid.Int4), field('name', TypeOid.Text)];
  const rowsOf = (n: number) => Array.from({ length: n }, (_, i) => [i + 1, `r${i + 1}`]);

  it('should batch rows into INSERT statements', async () => {
    const { sinks, context } = setup();
    const cursor = new ArrayCursor(fields, [
      [1, 'a'],
      [2, 'b'],
      [3, null],
    ]);

    await new SqlExporter(context).export(
      cursor,
      options({ format: 'sql', insertTable: 'public.users', rowsPerStatement: 2 })
    );

    expect(sinks.sinks[0].text()).toBe(
      'INSERT INTO "public"."users" ("id", "name") VALUES\n' +
        "\t(1, 'a'),\n" +
        "\t(2, 'b');\n" +
        'INSERT INTO "public"."users" ("id", "name") VALUES\n' +
        '\t(3, NULL);\n'
    );
  });

  it.each([
    [5, 2, 3],
    [4, 2, 2],
    [3, 1, 3],
    [2, 10, 1],
  ])('should write ceil(%i / %i) = %i statements', async (rowCount, batch, statements) => {
    const { sinks, context } = setup();

    await new SqlExporter(context).export(
      new ArrayCursor(fields, rowsOf(rowCount)),
      options({ format: 'sql', insertTable: 't', rowsPerStatement: batch })
    );

    expect(sinks.sinks[0].text().split('INSERT INTO').length - 1).toBe(statements);
  });

  it('should write nothing for an empty result', async () => {
    const { sinks, context } = setup();

    const count = await new SqlExporter(context).export(
      new ArrayCursor(fields, []),
      options({ format: 'sql', insertTable: 't' })
    );

    expect(count).toBe(0);
    expect(sinks.sinks[0].text()).toBe('');
  });

  it('should require a table before opening the output', async () => {
    const { sinks, context } = setup();
    const invalid = { ...options({ format: 'sql', insertTable: 't' }), insertTable: '  ' };

    await expect(new SqlExporter(context).export(new ArrayCursor(fields, []), invalid)).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(sinks.configs).toHaveLength(0);
  });
});

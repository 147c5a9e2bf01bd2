import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { GraphConverter, statementsOf } from '../lib/converter.ts';
import { PathNavigator } from '../lib/json/path-navigator.ts';
import { fixturePath, readFixture } from './helpers/mock-fs.ts';
import { FIXTURE_DATA, FIXTURE_INDEXES, FIXTURE_SCHEMA } from './helpers/fixture-output.ts';

describe('GraphConverter', () => {
  it('should convert the fixture files', async () => {
    const result = await new GraphConverter().convertFiles(fixturePath('mapping.yaml'), fixturePath('data.json'));

    assert.deepEqual(result, { schema: FIXTURE_SCHEMA, indexes: FIXTURE_INDEXES, data: FIXTURE_DATA });
    assert.deepEqual(statementsOf(result), [...FIXTURE_SCHEMA, ...FIXTURE_DATA]);
  });

  it('should place index statements after the schema only on request', async () => {
    const result = await new GraphConverter().convertFiles(fixturePath('mapping.yaml'), fixturePath('data.json'));

    assert.deepEqual(statementsOf(result, { withIndexes: true }), [
      ...FIXTURE_SCHEMA,
      ...FIXTURE_INDEXES,
      ...FIXTURE_DATA,
    ]);
  });

  it('should skip data statements in schema-only mode', async () => {
    const result = await new GraphConverter().convertFiles(fixturePath('mapping.yaml'), fixturePath('data.json'), {
      schemaOnly: true,
    });
    assert.deepEqual(result.data, []);
    assert.equal(result.schema.length, 3);
  });

  it('should honour the batch size', async () => {
    const converter = new GraphConverter();
    const mapping = converter.parseMapping(await readFixture('mapping.yaml'));
    const document = { people: [], companies: [], employment: [] };

    assert.deepEqual(converter.convert(mapping, document, { batchSize: 1 }).data, []);

    const people = {
      people: [
        { id: 'a', name: 'A', age: 1, active: true },
        { id: 'b', name: 'B', age: 2, active: false },
      ],
      companies: [],
      employment: [],
    };
    assert.deepEqual(converter.convert(mapping, people, { batchSize: 1 }).data, [
      'INSERT VERTEX Person (name, age, active) VALUES "a":("A", 1, true);',
      'INSERT VERTEX Person (name, age, active) VALUES "b":("B", 2, false);',
    ]);
  });

  it('should reuse an injected navigator across documents', () => {
    const navigator = new PathNavigator();
    const converter = new GraphConverter({ navigator });
    const mapping = converter.parseMapping('tags:\n  T:\n    from: /rows\n');

    converter.convert(mapping, { rows: [{ id: 'a' }] });
    const size = navigator.cacheSize();
    converter.convert(mapping, { rows: [{ id: 'b' }] });

    assert.equal(converter.navigator, navigator);
    assert.equal(navigator.cacheSize(), size);
  });
});

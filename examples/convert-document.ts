/**
 * Example: Mapping a JSON document to nGQL
 *
 * This example demonstrates:
 * 1. Parsing an inline YAML mapping and converting a document
 * 2. Registering a custom transform
 * 3. Generating cleanup statements for the same mapping
 */

import { GraphConverter, generateCleanupStatements, statementsOf, stringResult } from '../lib/index.ts';

const MAPPING = `
settings:
  string_length: 64
tags:
  Product:
    from: /catalog
    key: sku
    properties:
      - json: title
        type: string
        index: true
      - json: price
        type: int
        transform:
          function: price_normalize
      - json: category
        type: string
        transform: shout
edges:
  BUNDLED_WITH:
    from: /bundles
    source_tag: Product
    target_tag: Product
    source_key: a
    target_key: b
`;

const DOCUMENT = {
  catalog: [
    { sku: 'sku-1', title: 'Kettle', price: '$25', category: 'kitchen' },
    { sku: 'sku-2', title: 'Teapot', price: '$18', category: 'kitchen' },
  ],
  bundles: [{ a: 'sku-1', b: 'sku-2' }],
};

function main(): void {
  const converter = new GraphConverter();

  converter.transforms.register('shout', (input) => stringResult(String(input.value.value).toUpperCase()));

  const mapping = converter.parseMapping(MAPPING);
  const result = converter.convert(mapping, DOCUMENT, { batchSize: 100 });

  console.log('-- Schema, indexes and data');
  for (const statement of statementsOf(result, { withIndexes: true })) {
    console.log(statement);
  }

  console.log('\n-- Cleanup');
  for (const statement of generateCleanupStatements(mapping)) {
    console.log(statement);
  }
}

main();

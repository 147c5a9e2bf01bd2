/**
 * Statements expected from test/fixtures/mapping.yaml applied to test/fixtures/data.json.
 */

export const FIXTURE_SCHEMA = [
  [
    'CREATE TAG IF NOT EXISTS Person (',
    '    name STRING(128) NOT NULL,',
    '    age INT64,',
    '    active BOOL NOT NULL DEFAULT true',
    ') ttl_duration = 0, ttl_col = "";',
  ].join('\n'),
  'CREATE TAG IF NOT EXISTS Company (\n    founded STRING(32) NOT NULL\n) ttl_duration = 0, ttl_col = "";',
  'CREATE EDGE IF NOT EXISTS WORKS_AT (\n    salary INT64 NOT NULL\n) ttl_duration = 0, ttl_col = "";',
];

export const FIXTURE_INDEXES = ['CREATE TAG INDEX IF NOT EXISTS Person_name_idx ON Person(name(128));'];

export const FIXTURE_DATA = [
  'INSERT VERTEX Person (name, age, active) VALUES "p1":("Ada Lovelace", 36, true), "p2":("Alan Turing", NULL, false);',
  'INSERT VERTEX Company (founded) VALUES "7":("1999-01-02 00:00:00");',
  'INSERT EDGE WORKS_AT (salary) VALUES "p1" -> "7":(1200);',
];

import type { FieldSpec, RecordSchema } from '../schema/recordSchema';

export function sqlTypeFor(field: FieldSpec): string {
  switch (field.type) {
    case 'string':
      return 'TEXT';
    case 'integer':
      return 'INTEGER';
    case 'number':
      return 'DOUBLE PRECISION';
    case 'boolean':
      return 'SMALLINT';
    case 'array':
    case 'object':
      return 'TEXT';
  }
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const DOCUMENTS_DDL = `CREATE TABLE IF NOT EXISTS documents (
  id BIGSERIAL PRIMARY KEY,
  file_name TEXT NOT NULL,
  file_path TEXT,
  file_hash TEXT NOT NULL UNIQUE,
  file_size BIGINT,
  uploaded_at TIMESTAMPTZ NOT NULL DEFAULT now(),

  document_content TEXT,
  ocr_images TEXT,
  ocr_provider TEXT,
  ocr_log TEXT,

  title TEXT,
  first_author_lastname TEXT,
  authors TEXT,
  publication_year INTEGER,
  doi TEXT,
  journal TEXT,
  volume TEXT,
  issue TEXT,
  pages TEXT,
  issn TEXT,
  publisher TEXT,
  bibliography TEXT,
  language TEXT,
  metadata_llm_model TEXT,
  metadata_log TEXT,

  extraction_llm_model TEXT,
  extraction_log TEXT,
  records_extracted INTEGER DEFAULT 0,
  refinement_llm_model TEXT,
  refinement_log TEXT,

  ocr_status TEXT,
  metadata_status TEXT,
  extraction_status TEXT,
  refinement_status TEXT,

  reviewed_at TIMESTAMPTZ
);`;

const RECORD_EDITS_DDL = `CREATE TABLE IF NOT EXISTS record_edits (
  id BIGSERIAL PRIMARY KEY,
  document_id BIGINT NOT NULL REFERENCES documents(id),
  record_id BIGINT NOT NULL REFERENCES records(id),
  column_name TEXT NOT NULL,
  original_value TEXT,
  new_value TEXT,
  edited_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE INDEX IF NOT EXISTS idx_record_edits_document ON record_edits(document_id);`;

/**
 * DDL for the three pipeline tables. Record columns come from the active
 * schema, so the output changes whenever the schema file does.
 */
export function buildMigrationSql(schema: RecordSchema): string {
  const fieldColumns = schema.fields.map(
    (field) => `  ${quoteIdent(field.name)} ${sqlTypeFor(field)},`
  );

  const recordsDdl = [
    'CREATE TABLE IF NOT EXISTS records (',
    '  id BIGSERIAL PRIMARY KEY,',
    '  document_id BIGINT NOT NULL REFERENCES documents(id),',
    '  record_id TEXT NOT NULL,',
    ...fieldColumns,
    '  added_by_user BOOLEAN NOT NULL DEFAULT FALSE,',
    '  deleted_by_user BOOLEAN NOT NULL DEFAULT FALSE,',
    '  human_edited BOOLEAN NOT NULL DEFAULT FALSE,',
    '  llm_model TEXT,',
    '  prompt_hash TEXT,',
    '  extracted_at TIMESTAMPTZ',
    ');',
    '',
    'CREATE INDEX IF NOT EXISTS idx_records_document ON records(document_id);',
    'CREATE INDEX IF NOT EXISTS idx_records_business_key ON records(document_id, record_id);',
  ].join('\n');

  const alterColumns = schema.fields.map(
    (field) =>
      `ALTER TABLE records ADD COLUMN IF NOT EXISTS ${quoteIdent(field.name)} ${sqlTypeFor(field)};`
  );

  return [
    `-- record schema version ${schema.version}`,
    DOCUMENTS_DDL,
    recordsDdl,
    '-- columns added by later schema versions',
    ...alterColumns,
    RECORD_EDITS_DDL,
    '',
  ].join('\n\n');
}

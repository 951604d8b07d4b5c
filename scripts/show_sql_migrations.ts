import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import { buildMigrationSql } from '../src/db/migrations';
import { loadRecordSchema } from '../src/schema/recordSchema';

async function main() {
  const args = process.argv.slice(2);
  const outIndex = args.indexOf('--out');
  const outFile = outIndex === -1 ? undefined : args[outIndex + 1];
  const positional = args.filter((arg, i) => !arg.startsWith('--') && (outIndex === -1 || i !== outIndex + 1));
  const schemaFile = positional[0] ?? process.env.SCHEMA_FILE ?? 'schemas/schema.json';

  const schema = await loadRecordSchema(schemaFile);
  const sql = buildMigrationSql(schema);

  if (outFile) {
    await fs.mkdir(path.dirname(outFile), { recursive: true });
    await fs.writeFile(outFile, sql, 'utf8');
    console.log(`Wrote migration for ${schemaFile} (${schema.fields.length} fields) to ${outFile}`);
    return;
  }

  console.log('Run this SQL in your Supabase SQL editor:\n');
  console.log(sql);
}

main().catch((error) => {
  console.error('Failed to build migration:', error);
  process.exit(1);
});

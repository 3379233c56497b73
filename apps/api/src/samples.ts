import path from 'path';
import { fileURLToPath } from 'url';
import { loadSchemaDirectory } from './ingest/document';
import { SchemaRegistry } from './registry/registry';
import type { Row } from './types/schema';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const SAMPLES_DIR = path.join(__dirname, '../samples');

/** Rows of the clinic database at 1.0.0. */
export const sampleData: Record<string, Row[]> = {
  patient: [
    { id: 1, name: 'Jane Tan', dob: '1984-05-12', email: 'jane@example.org' },
    { id: 2, name: 'Ali Rahman', dob: '1990-11-03', email: null },
    { id: 3, name: 'Maya Lee', dob: null, email: 'maya@example.org' }
  ],
  visit: [
    { id: 10, patient_id: 1, visited_on: '2024-02-15', notes: 'checkup', fee: 40 },
    { id: 11, patient_id: 1, visited_on: '2024-03-01', notes: null, fee: 25 },
    { id: 12, patient_id: 2, visited_on: '2024-03-07', notes: 'follow-up', fee: null },
    { id: 13, patient_id: 3, visited_on: '2024-03-08', notes: null, fee: 60 }
  ]
};

/** Registry holding the clinic schema history (1.0.0, 1.1.0, 2.0.0). */
export const loadSampleRegistry = async (registry = new SchemaRegistry()) => {
  await loadSchemaDirectory(registry, SAMPLES_DIR);
  return registry;
};

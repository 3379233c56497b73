import express from 'express';
import type { Response } from 'express';
import cors from 'cors';
import multer from 'multer';

import { getConfig } from './config';
import { errorMessage, isFerryError, schemaInvalid } from './errors';
import type { ErrorKind } from './errors';
import { ingestDDL } from './ingest/ddl';
import { parseSchemaDocument, registerDocument } from './ingest/document';
import type { ParsedDocument } from './ingest/document';
import { createModuleLogger } from './logger';
import { FieldMapper } from './map/mapper';
import { coverageGaps, geminiClient, suggestOverrides } from './map/suggest';
import type { SuggestionClient } from './map/suggest';
import { SchemaRegistry } from './registry/registry';
import { loadSampleRegistry, sampleData } from './samples';
import { InMemoryArchiveStore } from './store';
import type { ArchiveStore } from './store';
import { compareVersions } from './utils/version';

const log = createModuleLogger('http');

export type AppDeps = {
  registry?: SchemaRegistry;
  mapper?: FieldMapper;
  archives?: ArchiveStore;
  /** Null disables override suggestions. */
  suggestions?: SuggestionClient | null;
};

const STATUS_BY_KIND: Partial<Record<ErrorKind, number>> = {
  UnknownVersion: 404,
  DuplicateVersion: 409,
  ConstraintViolation: 409,
  Cancelled: 409,
  SchemaInvalid: 422,
  NoMigrationPath: 422,
  AmbiguousMatch: 422,
  UnsupportedCoercionChain: 422,
  CoverageGap: 422,
  BaseVersionMismatch: 422,
  BrokenArchiveChain: 422,
  RowCoercionError: 422,
  Transient: 503
};

const sendError = (res: Response, err: unknown, fallback: string) => {
  if (isFerryError(err)) {
    const { cause: _cause, ...details } = err.details;
    return res.status(STATUS_BY_KIND[err.kind] ?? 500).json({ error: err.message, kind: err.kind, details });
  }
  log.error({ err }, fallback);
  return res.status(500).json({ error: errorMessage(err) || fallback });
};

const defaultSuggestions = (): SuggestionClient | null => {
  const { gemini } = getConfig();
  return gemini.apiKey ? geminiClient(gemini.apiKey, gemini.model) : null;
};

export const createApp = (deps: AppDeps = {}) => {
  const registry = deps.registry ?? new SchemaRegistry();
  const mapper = deps.mapper ?? new FieldMapper(registry, { threshold: getConfig().fuzzyThreshold });
  const archives = deps.archives ?? new InMemoryArchiveStore();
  const suggestions = deps.suggestions === undefined ? defaultSuggestions() : deps.suggestions;

  const app = express();
  const upload = multer();

  app.use(cors());
  app.use(express.json({ limit: '5mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/api/samples', async (_req, res) => {
    try {
      const samples = await loadSampleRegistry();
      res.json({ versions: samples.list(), rows: sampleData });
    } catch (err) {
      sendError(res, err, 'Failed to load samples');
    }
  });

  app.get('/api/schemas', (_req, res) => {
    res.json({ versions: registry.list() });
  });

  app.post('/api/schemas', (req, res) => {
    try {
      const version = registerDocument(registry, req.body);
      res.status(201).json({ version });
    } catch (err) {
      sendError(res, err, 'Schema registration failed');
    }
  });

  app.post('/api/schemas/upload', upload.array('files'), (req, res) => {
    try {
      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) return res.status(400).json({ error: 'No schema documents uploaded.' });

      const docs: ParsedDocument[] = files.map(file => {
        let raw: unknown;
        try {
          raw = JSON.parse(file.buffer.toString('utf8'));
        } catch (err) {
          throw schemaInvalid(`${file.originalname} is not valid JSON`, { cause: err });
        }
        return parseSchemaDocument(raw);
      });
      docs.sort((a, b) => compareVersions(a.version, b.version));
      const versions = docs.map(doc => registry.register(doc.version, doc.definition, { parent: doc.parent }));
      res.status(201).json({ versions });
    } catch (err) {
      sendError(res, err, 'Schema upload failed');
    }
  });

  app.post('/api/schemas/ddl', (req, res) => {
    try {
      const { version, ddl, dialect, parent, description } = req.body || {};
      if (typeof version !== 'string' || typeof ddl !== 'string' || !version || !ddl) {
        return res.status(400).json({ error: 'version and ddl are required' });
      }
      const tables = ingestDDL(ddl, typeof dialect === 'string' ? dialect : 'postgresql');
      const registered = registry.register(
        version,
        { tables, description: typeof description === 'string' ? description : undefined },
        { parent: typeof parent === 'string' ? parent : undefined }
      );
      res.status(201).json({ version: registered });
    } catch (err) {
      sendError(res, err, 'DDL ingest failed');
    }
  });

  app.get('/api/schemas/:version', (req, res) => {
    try {
      res.json({ version: registry.get(req.params.version) });
    } catch (err) {
      sendError(res, err, 'Failed to read schema');
    }
  });

  app.get('/api/schemas/:from/diff/:to', (req, res) => {
    try {
      res.json({ diff: registry.diff(req.params.from, req.params.to) });
    } catch (err) {
      sendError(res, err, 'Diff failed');
    }
  });

  app.get('/api/schemas/:from/path/:to', (req, res) => {
    try {
      res.json({ path: registry.path(req.params.from, req.params.to) });
    } catch (err) {
      sendError(res, err, 'Path lookup failed');
    }
  });

  app.get('/api/mappings/:from/:to', async (req, res) => {
    try {
      const ruleSet = await mapper.ruleSet(req.params.from, req.params.to);
      res.json({ ruleSet });
    } catch (err) {
      sendError(res, err, 'Mapping inference failed');
    }
  });

  app.post('/api/mappings/suggest', async (req, res) => {
    try {
      const { from, to } = req.body || {};
      if (typeof from !== 'string' || typeof to !== 'string' || !from || !to) {
        return res.status(400).json({ error: 'from and to are required' });
      }
      if (!suggestions) return res.status(400).json({ error: 'GEMINI_API_KEY is not configured' });

      const ruleSet = await mapper.ruleSet(from, to);
      const gaps = coverageGaps(ruleSet, registry.get(from), registry.get(to));
      const result = await suggestOverrides(gaps, suggestions);
      res.json({ coverage: ruleSet.coverage, gaps, ...result });
    } catch (err) {
      sendError(res, err, 'Suggestion request failed');
    }
  });

  app.get('/api/archives', async (_req, res) => {
    try {
      res.json({ archives: await archives.list() });
    } catch (err) {
      sendError(res, err, 'Failed to list archives');
    }
  });

  app.get('/api/archives/:id', async (req, res) => {
    try {
      const archive = await archives.load(req.params.id);
      if (!archive) return res.status(404).json({ error: `Archive ${req.params.id} not found` });
      res.json({ archive });
    } catch (err) {
      sendError(res, err, 'Failed to read archive');
    }
  });

  return app;
};

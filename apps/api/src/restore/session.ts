import { randomUUID } from 'crypto';
import type { RowPolicy } from '../config';
import { createModuleLogger } from '../logger';
import type { ResolvedRules } from '../map/mapper';
import type { Finding } from '../report';

const log = createModuleLogger('restore');

export const RESTORE_STATES = [
  'Resolving',
  'RuleChainReady',
  'Validating',
  'Transforming',
  'Committing',
  'Committed',
  'RolledBack'
] as const;

export type RestoreState = (typeof RESTORE_STATES)[number];

export type RestoreMode = 'full' | 'incremental';

const TRANSITIONS: Record<RestoreState, readonly RestoreState[]> = {
  Resolving: ['RuleChainReady', 'RolledBack'],
  RuleChainReady: ['Validating', 'RolledBack'],
  Validating: ['Transforming', 'RolledBack'],
  Transforming: ['Committing', 'RolledBack'],
  Committing: ['Committed', 'RolledBack'],
  Committed: [],
  RolledBack: []
};

export const isTerminal = (state: RestoreState) => TRANSITIONS[state].length === 0;

export type SessionInit = {
  id?: string;
  archiveId: string;
  sourceVersion: string;
  targetVersion: string;
  policy: RowPolicy;
  mode: RestoreMode;
};

/** State of one restore operation, from rule resolution to commit or rollback. */
export class RestoreSession {
  readonly id: string;
  readonly archiveId: string;
  readonly sourceVersion: string;
  readonly targetVersion: string;
  readonly policy: RowPolicy;
  readonly mode: RestoreMode;
  readonly findings: Finding[] = [];
  readonly history: { state: RestoreState; at: string }[] = [];
  rules: ResolvedRules | null = null;
  private current: RestoreState = 'Resolving';

  constructor(init: SessionInit) {
    this.id = init.id ?? randomUUID();
    this.archiveId = init.archiveId;
    this.sourceVersion = init.sourceVersion;
    this.targetVersion = init.targetVersion;
    this.policy = init.policy;
    this.mode = init.mode;
    this.history.push({ state: this.current, at: new Date().toISOString() });
  }

  get state() {
    return this.current;
  }

  get path() {
    return this.history.map(h => h.state);
  }

  transition(next: RestoreState) {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal restore transition ${this.current} -> ${next}`);
    }
    log.debug({ sessionId: this.id, from: this.current, to: next }, 'restore state change');
    this.current = next;
    this.history.push({ state: next, at: new Date().toISOString() });
  }

  /** Adds a finding unless an identical one is already recorded. */
  record(finding: Finding) {
    const duplicate = this.findings.some(
      f => f.kind === finding.kind && f.table === finding.table && f.field === finding.field && f.message === finding.message
    );
    if (!duplicate) this.findings.push(finding);
  }
}

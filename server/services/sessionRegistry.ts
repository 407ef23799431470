import { v4 as uuidv4 } from 'uuid';
import { logger } from '../logger';
import { LoanStatsProvider, SeededLoanStatsProvider } from './loanStatsProvider';
import { SessionStore } from './sessionStore';

export interface SessionRegistryOptions {
  idleTtlMs: number;
  statsProvider?: LoanStatsProvider;
  now?: () => Date;
  createId?: () => string;
}

/**
 * Holds one SessionStore per browser session. A session is created when the
 * client starts, ended when it says so, and pruned once idle past the TTL.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionStore>();
  private readonly statsProvider: LoanStatsProvider;
  private readonly now: () => Date;
  private readonly createId: () => string;

  constructor(private readonly options: SessionRegistryOptions) {
    this.statsProvider = options.statsProvider ?? new SeededLoanStatsProvider();
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => uuidv4());
  }

  create(): SessionStore {
    this.prune();
    const session = new SessionStore(this.createId(), this.statsProvider, this.now());
    this.sessions.set(session.id, session);
    logger.info(`🆕 Session ${session.id} started (${this.sessions.size} active)`);
    return session;
  }

  get(id: string): SessionStore | undefined {
    this.prune();
    const session = this.sessions.get(id);
    session?.touch(this.now());
    return session;
  }

  end(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) logger.info(`👋 Session ${id} ended`);
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private prune(): void {
    const cutoff = this.now().getTime() - this.options.idleTtlMs;
    for (const [id, session] of this.sessions.entries()) {
      if (session.lastSeenAt.getTime() < cutoff) {
        this.sessions.delete(id);
        logger.info(`⌛ Session ${id} expired after inactivity`);
      }
    }
  }
}

/**
 * Audit Service - write-only security trail
 *
 * Follows the Null Object Pattern: a default-constructed service accepts
 * entries and drops them, so components never need to check whether auditing
 * is configured. Storage of the trail is a pluggable collaborator.
 */

import type { AuditEntry } from './types.js';
import { sanitizeError } from '../utils/errors.js';

// ============================================================================
// Interfaces
// ============================================================================

export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Record successful operations as well as failures (default: true) */
  logAllAttempts?: boolean;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Invoked with a copy of the buffer when the in-memory storage overflows */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries.
 *
 * Write-only. Querying belongs to whatever indexed store sits
 * behind an implementation.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

export const DEFAULT_AUDIT_CAPACITY = 10000;

/**
 * Bounded in-memory buffer. On overflow the callback sees every buffered
 * entry before the oldest one is discarded.
 */
export class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly maxEntries: number = DEFAULT_AUDIT_CAPACITY,
    private readonly onOverflow?: (entries: AuditEntry[]) => void
  ) {}

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.onOverflow?.([...this.entries]);
      this.entries.shift();
    }
  }

  /** @internal test access */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /** @internal */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * @example
 * ```typescript
 * const audit = new AuditService({ enabled: true, logAllAttempts: false });
 * await audit.log({
 *   timestamp: new Date(),
 *   source: 'auth:refresh',
 *   action: 'refresh:replay',
 *   success: false,
 *   userId: principalId,
 * });
 * ```
 */
export class AuditService {
  private readonly enabled: boolean;
  private readonly logAllAttempts: boolean;
  private readonly storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;
    this.storage =
      config?.storage ?? new InMemoryAuditStorage(DEFAULT_AUDIT_CAPACITY, config?.onOverflow);
  }

  /**
   * Record an entry. Every entry must name its source component.
   *
   * A failing storage write is reported on the console and never reaches the
   * caller: callers audit after their state change has already committed.
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    if (entry.success && !this.logAllAttempts) {
      return;
    }

    try {
      await this.storage.log(entry);
    } catch (error) {
      console.error('[AuditService] Failed to write audit entry:', {
        source: entry.source,
        action: entry.action,
        error: sanitizeError(error),
      });
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /** @internal */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

/**
 * Preview Types
 *
 * Persisted state of a preview and the results returned by the orchestrator.
 */

import type { RouteHealth, RouteRef, UnitDescription, UnitRef } from '../provisioner/ResourceProvisioner.js';

// ============================================================================
// Persisted State
// ============================================================================

export const PREVIEW_STATUSES = ['creating', 'active', 'extending', 'deleting', 'failed'] as const;

export type PreviewStatus = typeof PREVIEW_STATUSES[number];

export interface ResourceRefs {
  unit?: UnitRef;
  route?: RouteRef;
}

export interface PreviewRecord {
  previewId: string;
  status: PreviewStatus;
  createdAt: string;          // ISO timestamp
  expiresAt: string;          // ISO timestamp, never moves backwards
  resourceRefs: ResourceRefs;
  scheduleRef?: string;       // Handle of the armed expiry trigger
  previewUrl: string;
  version: number;            // Write fence for conditional updates
  updatedAt: string;
  lastError?: string;         // Set when the record is left as 'failed'
}

// ============================================================================
// Orchestrator Results
// ============================================================================

export interface CreatedPreview {
  previewId: string;
  previewUrl: string;
  expiresAt: string;
}

export interface ExtendedPreview {
  previewId: string;
  expiresAt: string;
}

export type ProbeState = UnitDescription['state'] | 'unknown';

export interface PreviewDetail {
  record: PreviewRecord;
  unit: {
    state: ProbeState;
    desired?: number;
    running?: number;
    pending?: number;
  };
  route: RouteHealth;
}

export interface PreviewTestResult {
  statusCode?: number;
  error?: string;
}

export type CleanupReason = 'expired' | 'user' | 'reconcile';

export type CleanupOutcome = 'deleted' | 'absent' | 'skipped' | 'failed';

export interface CleanupResult {
  previewId: string;
  outcome: CleanupOutcome;
  attempts: number;
  error?: string;
}

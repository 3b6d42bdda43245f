import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { CaseRunOutcome } from './types.js';

export interface CaseRunEntry {
  case_id: string;
  suspect_name: string;
  outcome: CaseRunOutcome;
  links_total: number;
  links_failed: number;
  files_uploaded: number;
  files_failed: number;
  shared_link: string | null;
  error_message?: string;
  execution_time_ms: number;
}

export interface CaseRunLog {
  record(entry: CaseRunEntry): Promise<void>;
}

const TABLE = 'case_runs';

/**
 * Saves one row per processed case. Write failures are reported on the
 * console and never interrupt the pipeline.
 */
export class SupabaseCaseRunLog implements CaseRunLog {
  private readonly supabase: SupabaseClient;

  constructor(supabase: SupabaseClient) {
    this.supabase = supabase;
  }

  static fromCredentials(url: string, serviceRoleKey: string): SupabaseCaseRunLog {
    return new SupabaseCaseRunLog(createClient(url, serviceRoleKey, { auth: { persistSession: false } }));
  }

  async record(entry: CaseRunEntry): Promise<void> {
    try {
      const { error } = await this.supabase
        .from(TABLE)
        .insert({ ...entry, executed_at: new Date().toISOString() });

      if (error) {
        console.error('[AutoLogger] Failed to save case run:', error.message);
      }
    } catch (error) {
      console.error('[AutoLogger] Exception in record:', error);
    }
  }
}

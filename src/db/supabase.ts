// ============================================
// Supabase client — service-role access to indexes and ownership tables
// ============================================

import { createClient } from "@supabase/supabase-js";
import { config } from "../config/env.js";

export const supabase = createClient(config.supabase.url, config.supabase.serviceRoleKey, {
  auth: { persistSession: false },
});

export type SupabaseClient = typeof supabase;

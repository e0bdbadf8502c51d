// Supabase client configuration for the sync engine
// Service-key client: no session is persisted or refreshed

import { createClient, SupabaseClient } from '@supabase/supabase-js'

export type { SupabaseClient }

export interface StoreConnectionConfig {
  url: string
  key: string
  clientInfo?: string
}

export const DEFAULT_CLIENT_INFO = 'sheetreplica-sync'

export const createStoreClient = (config: StoreConnectionConfig): SupabaseClient => {
  if (!config.url) {
    throw new Error('Missing Supabase URL')
  }

  if (!config.key) {
    throw new Error('Missing Supabase key')
  }

  return createClient(config.url, config.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': config.clientInfo ?? DEFAULT_CLIENT_INFO
      }
    }
  })
}

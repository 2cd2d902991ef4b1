/**
 * Catalog of capabilities a user may grant through the external authorization provider
 */
export type ScopeId =
  | 'drive'
  | 'gmail_readonly'
  | 'gmail_full'
  | 'gmail_labels'
  | 'gmail_compose'
  | 'calendar_events'
  | 'calendar_readonly'
  | 'documents'
  | 'spreadsheets'
  | 'spreadsheets_readonly';

export interface ScopeInfo {
  id: ScopeId;
  url: string;
  description: string;
}

export const AVAILABLE_SCOPES: Record<ScopeId, ScopeInfo> = {
  drive: {
    id: 'drive',
    url: 'https://www.googleapis.com/auth/drive',
    description: 'Full access to Google Drive files and folders',
  },
  gmail_readonly: {
    id: 'gmail_readonly',
    url: 'https://www.googleapis.com/auth/gmail.readonly',
    description: 'Read-only access to Gmail',
  },
  gmail_full: {
    id: 'gmail_full',
    url: 'https://www.googleapis.com/auth/gmail.modify',
    description: 'Full access to Gmail (read, send, modify)',
  },
  gmail_labels: {
    id: 'gmail_labels',
    url: 'https://www.googleapis.com/auth/gmail.labels',
    description: 'Manage Gmail labels',
  },
  gmail_compose: {
    id: 'gmail_compose',
    url: 'https://www.googleapis.com/auth/gmail.compose',
    description: 'Compose Gmail messages',
  },
  calendar_events: {
    id: 'calendar_events',
    url: 'https://www.googleapis.com/auth/calendar.events',
    description: 'Manage calendar events',
  },
  calendar_readonly: {
    id: 'calendar_readonly',
    url: 'https://www.googleapis.com/auth/calendar.readonly',
    description: 'Read-only access to calendar',
  },
  documents: {
    id: 'documents',
    url: 'https://www.googleapis.com/auth/documents',
    description: 'Access Google Docs',
  },
  spreadsheets: {
    id: 'spreadsheets',
    url: 'https://www.googleapis.com/auth/spreadsheets',
    description: 'Access Google Sheets',
  },
  spreadsheets_readonly: {
    id: 'spreadsheets_readonly',
    url: 'https://www.googleapis.com/auth/spreadsheets.readonly',
    description: 'Read-only access to Google Sheets',
  },
};

export function listScopes(): ScopeInfo[] {
  return Object.values(AVAILABLE_SCOPES);
}

/**
 * Maps a scope id or provider scope URL to its catalog id
 */
export function resolveScopeId(value: string): ScopeId | null {
  for (const scope of listScopes()) {
    if (scope.id === value || scope.url === value) {
      return scope.id;
    }
  }
  return null;
}

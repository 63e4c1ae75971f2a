export interface ConversionEntry {
  source: string;
  target_format: string;
  output_path: string | null;
  timestamp: string;
  success: boolean;
  error?: string;
}

/** Where conversion attempts are remembered, keyed by document name. */
export interface ConversionHistoryStore {
  append(documentName: string, entry: ConversionEntry): Promise<void>;
  list(documentName: string): Promise<ConversionEntry[]>;
}

/**
 * Process-lifetime history. Entries are never evicted and are lost on restart.
 */
export class InMemoryConversionHistoryStore implements ConversionHistoryStore {
  private _entries = new Map<string, ConversionEntry[]>();

  async append(documentName: string, entry: ConversionEntry): Promise<void> {
    const list = this._entries.get(documentName);
    if (list) {
      list.push({ ...entry });
    } else {
      this._entries.set(documentName, [{ ...entry }]);
    }
  }

  async list(documentName: string): Promise<ConversionEntry[]> {
    return (this._entries.get(documentName) ?? []).map(entry => ({ ...entry }));
  }
}

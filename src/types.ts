export interface Shortcut {
  name: string;
  command: string;
  args: string[];
  /** Explicit project directory; derived from command/args when absent */
  dir?: string;
}

export interface ShortcutsData {
  shortcuts: Shortcut[];
}

export interface ShortcutInput {
  command: string;
  args: string[];
  dir?: string;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

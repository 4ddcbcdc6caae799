/**
 * Action plan model.
 *
 * The planner emits free-text step labels; execution dispatches on the
 * closed `ActionStepType` enum produced by `normalizeStepType`.
 */

export const ACTION_STEP_TYPES = [
  'create_file',
  'create_directory',
  'delete_file',
  'delete_directory',
  'rename_file',
  'move_file',
  'copy_file',
  'modify_code',
] as const;

export type ActionStepType = (typeof ACTION_STEP_TYPES)[number];

export interface ActionStep {
  step: number;
  title: string;
  description: string;
  /** Paths relative to the source root */
  artifacts: string[];
  /** Label as produced by the planner */
  label: string;
  /** Null when the label matches no supported operation */
  type: ActionStepType | null;
  points: number;
}

/**
 * Heuristic used when a label says "file/directory": a trailing separator or
 * a missing extension means directory.
 */
export function looksLikeDirectory(target: string | undefined): boolean {
  if (!target) {
    return false;
  }
  if (target.endsWith('/') || target.endsWith('\\')) {
    return true;
  }
  const base = target.split(/[\\/]/).pop() ?? '';
  return !base.includes('.');
}

function pickKind(
  words: string,
  fileType: ActionStepType,
  dirType: ActionStepType,
  artifact: string | undefined
): ActionStepType {
  const mentionsFile = words.includes('file');
  const mentionsDir = words.includes('directory') || words.includes('folder') || words.includes('dir ');
  if (mentionsDir && !mentionsFile) {
    return dirType;
  }
  if (mentionsFile && !mentionsDir) {
    return fileType;
  }
  return looksLikeDirectory(artifact) ? dirType : fileType;
}

/**
 * Maps a planner label (e.g. "Create new file/directory") onto the step enum.
 */
export function normalizeStepType(label: string, artifact?: string): ActionStepType | null {
  const words = `${label.toLowerCase().replace(/[^a-z]+/g, ' ').trim()} `;

  if (/\b(modify|update|edit|change|refactor)\b/.test(words)) {
    return 'modify_code';
  }
  if (/\brename\b/.test(words)) {
    return 'rename_file';
  }
  if (/\bmove\b/.test(words)) {
    return 'move_file';
  }
  if (/\bcopy\b/.test(words)) {
    return 'copy_file';
  }
  if (/\b(delete|remove)\b/.test(words)) {
    return pickKind(words, 'delete_file', 'delete_directory', artifact);
  }
  if (/\b(create|new|add)\b/.test(words)) {
    return pickKind(words, 'create_file', 'create_directory', artifact);
  }
  return null;
}

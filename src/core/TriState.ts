/**
 * Tri-State Flag
 *
 * Three-valued result used for index membership, open-access and hybrid
 * status. UNKNOWN means "not determined" (skipped, failed or unparseable)
 * and is never the same thing as FALSE.
 */
export enum TriState {
  /** Checked, and the answer is yes */
  TRUE = 'true',

  /** Checked, and the answer is no */
  FALSE = 'false',

  /** Not checked, or the answer could not be read */
  UNKNOWN = 'unknown',
}

export function triStateFromBoolean(value: boolean): TriState {
  return value ? TriState.TRUE : TriState.FALSE;
}

/**
 * Boolean view of a tri-state flag, `null` for UNKNOWN
 */
export function triStateToBoolean(value: TriState): boolean | null {
  switch (value) {
    case TriState.TRUE:
      return true;
    case TriState.FALSE:
      return false;
    case TriState.UNKNOWN:
      return null;
  }
}

import pc from 'picocolors';
import type { ColorMode } from '@findfile/shared';

export type Colors = ReturnType<typeof pc.createColors>;

/**
 * `auto` defers to picocolors' own detection (TTY, NO_COLOR, FORCE_COLOR).
 */
export function createColors(mode: ColorMode): Colors {
  if (mode === 'auto') {
    return pc.createColors(pc.isColorSupported);
  }
  return pc.createColors(mode === 'always');
}

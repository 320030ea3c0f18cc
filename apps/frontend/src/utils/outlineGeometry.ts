export interface OutlineDash {
  strokeDasharray: string;
  strokeDashoffset: number;
}

const round = (n: number) => Math.round(n * 1000) / 1000;

/**
 * SVG path for a stadium (fully rounded capsule) inset by `inset` on every
 * side. The path starts at the top centre and runs clockwise, so trimming
 * from 0 draws the outline the same way a clock hand moves.
 */
export function capsulePath(width: number, height: number, inset = 0): string {
  const w = Math.max(0, width - inset * 2);
  const h = Math.max(0, height - inset * 2);
  if (w === 0 || h === 0) return '';

  const r = Math.min(w, h) / 2;
  const left = inset;
  const top = inset;
  const right = inset + w;
  const bottom = inset + h;
  const cx = inset + w / 2;

  return [
    `M ${round(cx)} ${round(top)}`,
    `H ${round(right - r)}`,
    `A ${round(r)} ${round(r)} 0 0 1 ${round(right)} ${round(top + r)}`,
    `V ${round(bottom - r)}`,
    `A ${round(r)} ${round(r)} 0 0 1 ${round(right - r)} ${round(bottom)}`,
    `H ${round(left + r)}`,
    `A ${round(r)} ${round(r)} 0 0 1 ${round(left)} ${round(bottom - r)}`,
    `V ${round(top + r)}`,
    `A ${round(r)} ${round(r)} 0 0 1 ${round(left + r)} ${round(top)}`,
    'Z',
  ].join(' ');
}

/**
 * Dash pattern that shows the first `completionAmount` of a path drawn with
 * `pathLength="1"`. The gap is a full length so the visible dash never wraps.
 */
export function outlineDash(completionAmount: number): OutlineDash {
  const amount = Math.min(1, Math.max(0, completionAmount));
  return {
    strokeDasharray: '1 1',
    strokeDashoffset: round(1 - amount),
  };
}

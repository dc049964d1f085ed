export interface BinSteps {
  start: number;
  spacing: number;
}

export function niceNumber(span: number, round: boolean): number {
  const exp = Math.floor(Math.log10(span));
  const magnitude = 10 ** exp;
  const fraction = span / magnitude;

  let nice: number;
  if (round) {
    if (fraction < 1.5) nice = 1;
    else if (fraction < 3) nice = 2;
    else if (fraction < 7) nice = 5;
    else nice = 10;
  } else {
    if (fraction <= 1) nice = 1;
    else if (fraction <= 2) nice = 2;
    else if (fraction <= 5) nice = 5;
    else nice = 10;
  }
  return nice * magnitude;
}

export function calculateSteps(
  minimum: number,
  maximum: number,
  binCount: number,
  niceRange: boolean
): BinSteps {
  const range = maximum - minimum;
  if (!(range > 0)) {
    return { start: minimum, spacing: 1 };
  }

  if (!niceRange) {
    return { start: minimum, spacing: range / binCount };
  }

  const span = niceNumber(range, false);
  const spacing = niceNumber(span / Math.max(binCount - 1, 1), true);
  return { start: Math.floor(minimum / spacing) * spacing, spacing };
}

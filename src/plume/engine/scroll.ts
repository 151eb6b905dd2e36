/**
 * First visible line that keeps `cursorLine` at least `scrollMargin` lines
 * away from either viewport edge. The margin never exceeds half the viewport.
 */
export function calculateScroll(
  cursorLine: number,
  scrollLine: number,
  viewportLines: number,
  scrollMargin: number,
): number {
  const margin = Math.min(scrollMargin, Math.floor(viewportLines / 2));

  if (cursorLine < scrollLine + margin) {
    return Math.max(0, cursorLine - margin);
  }

  if (cursorLine >= scrollLine + viewportLines - margin) {
    return Math.max(0, cursorLine - viewportLines + margin + 1);
  }

  return scrollLine;
}

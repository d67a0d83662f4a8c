/**
 * Figure titles are stored as "title;x axis title;y axis title". They are
 * parsed once on load and carried around as a record afterwards.
 */

export interface FigureTitle {
  title: string;
  xTitle: string;
  yTitle: string;
}

export function parseFigureTitle(raw: string): FigureTitle {
  const first = raw.indexOf(';');
  if (first === -1) {
    return { title: raw, xTitle: '', yTitle: '' };
  }

  const second = raw.indexOf(';', first + 1);
  if (second === -1) {
    return { title: raw.slice(0, first), xTitle: raw.slice(first + 1), yTitle: '' };
  }

  return {
    title: raw.slice(0, first),
    xTitle: raw.slice(first + 1, second),
    yTitle: raw.slice(second + 1)
  };
}

export function formatFigureTitle({ title, xTitle, yTitle }: FigureTitle): string {
  if (yTitle) return `${title};${xTitle};${yTitle}`;
  if (xTitle) return `${title};${xTitle}`;
  return title;
}

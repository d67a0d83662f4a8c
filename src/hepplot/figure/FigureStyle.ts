/**
 * FigureStyle - every visual setting a draw needs, passed explicitly
 *
 * Text sizes are fractions of the smaller pixel dimension of the pad the text
 * is drawn in; offsets are fractions of the same length.
 */

export interface TickStyle {
  /** Approximate number of primary divisions on main-panel axes */
  divisions: number;
  /** Same for the residuals y axis */
  residualDivisions: number;
  /** Tick length as a fraction of the frame size */
  length: number;
  /** Draw ticks on the top and right frame edges too */
  mirrored: boolean;
}

export interface ThemeColors {
  background: string;
  text: string;
  axis: string;
  grid: string;
}

export interface FigureStyle {
  fontFamily: string;
  baseFontSize: number;
  titleFontSize: number;
  figureTitleFontSize: number;
  legendTextSize: number;
  annotationTextSize: number;
  axisLabelOffset: number;
  titleXOffset: number;
  titleYOffset: number;
  residualsTitleYOffset: number;
  maxAxisDigits: number;
  tickStyle: TickStyle;
  markerRadius: number;
  colors: string[];
  theme: 'light' | 'dark';
  canvasWidth: number;
  canvasHeight: number;
  residualsFraction: number;
  margin: number;
  mainPadWidth: number;
  pngScale: number;
}

export type FigureStyleOptions = Partial<Omit<FigureStyle, 'tickStyle'>> & {
  tickStyle?: Partial<TickStyle>;
};

// Named color mapping
export const NAMED_COLORS: Record<string, string> = {
  'red': '#CF7280',
  'yellow': '#DBB55C',
  'blue': '#658DCD',
  'green': '#96ceb4',
  'orange': '#f39c12',
  'purple': '#9b59b6',
  'pink': '#e91e63',
  'teal': '#1abc9c',
  'grey': '#95a5a6',
  'gray': '#95a5a6'
};

export const DEFAULT_STYLE: FigureStyle = {
  fontFamily: 'Helvetica, Arial, sans-serif',
  baseFontSize: 0.04,
  titleFontSize: 0.045,
  figureTitleFontSize: 0.04,
  legendTextSize: 0.03,
  annotationTextSize: 0.04,
  axisLabelOffset: 0.007,
  titleXOffset: 0.9,
  titleYOffset: 1.0,
  residualsTitleYOffset: 1.0,
  maxAxisDigits: 3,
  tickStyle: {
    divisions: 8,
    residualDivisions: 4,
    length: 0.03,
    mirrored: true
  },
  markerRadius: 0.006,
  colors: ['#658DCD', '#CF7280', '#DBB55C', '#96ceb4', '#9b59b6', '#f39c12'],
  theme: 'light',
  canvasWidth: 1500,
  canvasHeight: 1000,
  residualsFraction: 0.17,
  margin: 0.1,
  mainPadWidth: 0.85,
  pngScale: 1
};

// Convert named colors to hex codes, leave anything else untouched
export function resolveColor(color: string): string {
  return NAMED_COLORS[color.toLowerCase()] ?? color;
}

export function resolveStyle(options: FigureStyleOptions = {}): FigureStyle {
  const { tickStyle, ...rest } = options;
  const merged: FigureStyle = {
    ...DEFAULT_STYLE,
    ...rest,
    tickStyle: { ...DEFAULT_STYLE.tickStyle, ...tickStyle }
  };
  merged.colors = merged.colors.map(resolveColor);

  if (!(merged.residualsFraction > 0 && merged.residualsFraction < 1)) {
    throw new RangeError(`residualsFraction must lie in (0, 1), got ${merged.residualsFraction}`);
  }
  if (!(merged.margin >= 0 && merged.mainPadWidth > 0 && merged.mainPadWidth + merged.margin <= 1)) {
    throw new RangeError('margin and mainPadWidth must fit within the canvas width');
  }
  if (merged.colors.length === 0) {
    throw new RangeError('At least one fill colour is required');
  }
  return merged;
}

export function getThemeColors(theme: FigureStyle['theme']): ThemeColors {
  return {
    background: theme === 'dark' ? '#1a1a1a' : '#ffffff',
    text: theme === 'dark' ? '#ffffff' : '#000000',
    axis: theme === 'dark' ? '#999999' : '#000000',
    grid: theme === 'dark' ? '#555555' : '#bbbbbb'
  };
}

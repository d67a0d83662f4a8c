/**
 * Layout - geometry of the two-panel canvas
 *
 * Boxes are in normalized canvas coordinates: (0, 0) is the bottom-left
 * corner, (1, 1) the top-right one. Pad margins are fractions of the pad.
 */

import type { FigureStyle } from "./FigureStyle.ts";

export interface Box {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

export interface PadLayout {
  name: string;
  box: Box;
  margins: Margin;
  /** Pad does not paint its background */
  transparent: boolean;
}

export interface CanvasSize {
  width: number;
  height: number;
}

/** Pixel rectangle, y growing downwards */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FigureLayout {
  canvas: CanvasSize;
  bottomSpacing: number;
  margin: number;
  mainPad: PadLayout;
  residualsPad?: PadLayout;
  /** Factor applied to residual-panel text so it renders at the main-panel size */
  residualsTextScale: number;
  /** Factor applied to the residual x tick length */
  residualsTickScale: number;
  legendBox: Box;
}

export interface LayoutRequest {
  residuals: boolean;
  legendEntries: number;
  style: FigureStyle;
}

export const LEGEND_ENTRY_HEIGHT = 0.04;
export const HEADROOM = 1.1;

export function boxWidth(box: Box): number {
  return box.x2 - box.x1;
}

export function boxHeight(box: Box): number {
  return box.y2 - box.y1;
}

// Margins are given in canvas units and converted to pad fractions so the
// absolute space left for labels does not depend on the pad size
function padMargins(box: Box, margin: number, sides: { top: boolean }): Margin {
  const horizontal = margin / boxWidth(box);
  const vertical = margin / boxHeight(box);
  return {
    top: sides.top ? vertical : 0,
    right: horizontal,
    bottom: vertical,
    left: horizontal
  };
}

export function computeLayout({ residuals, legendEntries, style }: LayoutRequest): FigureLayout {
  const { margin, mainPadWidth } = style;
  const bottomSpacing = residuals ? style.residualsFraction : 0;

  const canvas: CanvasSize = {
    width: style.canvasWidth,
    height: Math.round(style.canvasHeight / (1 - bottomSpacing))
  };

  const mainBox: Box = { x1: 0, y1: bottomSpacing, x2: mainPadWidth + margin, y2: 1 };
  const mainPad: PadLayout = {
    name: 'mainPad',
    box: mainBox,
    margins: padMargins(mainBox, margin, { top: true }),
    transparent: false
  };

  let residualsPad: PadLayout | undefined;
  let residualsTextScale = 1;
  let residualsTickScale = 1;

  if (residuals) {
    const box: Box = { x1: 0, y1: 0, x2: mainPadWidth + margin, y2: bottomSpacing + margin };
    residualsPad = {
      name: 'residualsPad',
      box,
      margins: padMargins(box, margin, { top: false }),
      // Must not hide the lower half of the zero label of the main pad
      transparent: true
    };
    residualsTextScale = boxHeight(mainBox) / boxHeight(box);
    residualsTickScale = (1 - 2 * margin - bottomSpacing) / bottomSpacing;
  }

  return {
    canvas,
    bottomSpacing,
    margin,
    mainPad,
    residualsPad,
    residualsTextScale,
    residualsTickScale,
    legendBox: {
      x1: 0.86,
      y1: 0.9 - LEGEND_ENTRY_HEIGHT * legendEntries,
      x2: 0.99,
      y2: 0.9
    }
  };
}

/** Common maximum for the stack and the data so neither is clipped */
export function reconcileMaximum(stackMaximum: number, dataMaximum?: number): number {
  return HEADROOM * Math.max(stackMaximum, dataMaximum ?? -Infinity);
}

export function boxToPixels(box: Box, canvas: CanvasSize): PixelRect {
  return {
    x: box.x1 * canvas.width,
    y: (1 - box.y2) * canvas.height,
    width: boxWidth(box) * canvas.width,
    height: boxHeight(box) * canvas.height
  };
}

/** Region inside the pad margins where the axes frame is drawn */
export function frameToPixels(pad: PadLayout, canvas: CanvasSize): PixelRect {
  const rect = boxToPixels(pad.box, canvas);
  const { top, right, bottom, left } = pad.margins;
  return {
    x: rect.x + left * rect.width,
    y: rect.y + top * rect.height,
    width: rect.width * (1 - left - right),
    height: rect.height * (1 - top - bottom)
  };
}

/** Convert a relative text size to pixels for text drawn in `rect` */
export function fontPixels(size: number, rect: PixelRect): number {
  return size * Math.min(rect.width, rect.height);
}

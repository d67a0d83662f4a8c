export * from "./errors.ts";
export { createLogger, setLogLevel, getLogLevel, type LogLevel, type Logger } from "./logger.ts";
export { Histogram, type Bin, type FlowBin, type HistogramInit, type IntegralOptions } from "./histogram/Histogram.ts";
export { parseFigureTitle, formatFigureTitle, type FigureTitle } from "./figure/FigureTitle.ts";
export { normalizeMCToData, type Normalization } from "./figure/Normalizer.ts";
export { totalMC, computeResiduals, RESIDUALS_Y_TITLE } from "./figure/Residuals.ts";
export { DEFAULT_STYLE, resolveStyle, type FigureStyle, type FigureStyleOptions } from "./figure/FigureStyle.ts";
export { computeLayout, reconcileMaximum, type FigureLayout, type Box, type PadLayout } from "./figure/Layout.ts";
export { DrawTree, type DrawObject } from "./figure/DrawTree.ts";
export { DataMCFigure, type DataMCFigureInit, type ResidualsSettings } from "./figure/DataMCFigure.ts";
export { loadGroup, readStore, RESERVED_NAMES, type LoadedGroup } from "./io/HistogramStore.ts";
export { createStore, writeStore, figureInputsDirectory } from "./io/StoreWriter.ts";
export { convertSvgToPng } from "./charts/SvgToPng.ts";

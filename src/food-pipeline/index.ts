/**
 * Food pipeline barrel export.
 */

export type {
  AlternativeCandidate,
  DetectedSymbol,
  GrayFrame,
  NutrientKey,
  NutrientProfile,
  Product,
  RasterFrame,
  ScoreBand,
  SymbolDecoder,
} from "./types.js";
export { NUTRIENT_KEYS } from "./types.js";
export { calculateHealthScore, scoreBand } from "./health-score.js";
export {
  findHealthierAlternatives,
  isHealthierOption,
  rankAlternatives,
  searchCategory,
} from "./alternatives.js";
export {
  OpenFoodFactsClient,
  lookupProduct,
  parseNutrientValue,
  toNutrientProfile,
  type FoodDatabase,
} from "./open-food-facts.js";
export { FRAME_VARIANTS, loadFrame, scanFrame, scanImage } from "./barcode-scanner.js";
export { ZxingDecoder } from "./zxing-decoder.js";
export { formatNumber, formatNutritionFacts, renderNutritionFacts } from "./nutrition-facts.js";
export {
  emptySession,
  evaluateBarcode,
  evaluateImage,
  evaluateProduct,
  withReport,
  type ImageEvaluation,
  type ScanDependencies,
  type ScanReport,
  type ScanSession,
} from "./scan-service.js";
export { describeError, FoodDatabaseError } from "./errors.js";

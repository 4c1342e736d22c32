// src/extraction/index.ts

export { Extractor, extract } from "./extractor";
export {
  BaseMapping,
  type FieldCategory,
  type FieldInfo,
  type IncludableMapping,
  type IncludeMappingOptions,
} from "./mappings";
export { MappingRegistry, type SourceMapping } from "./registry";
export {
  DEFAULT_STAGES,
  baseAttributesStage,
  computedFieldsStage,
  relationshipsStage,
  fieldMappingStage,
  relationshipMappingStage,
  customComputedStage,
} from "./stages";
export type {
  ComputedField,
  ExtractionContext,
  ExtractionStage,
  ExtractorOptions,
  RelationKind,
} from "./types";
export { LoanApplicantMapping, ProfileMapping, UserMapping, createDefaultRegistry } from "./builtin";

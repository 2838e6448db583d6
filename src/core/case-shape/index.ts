export {
  CASE_CONVENTIONS,
  splitWords,
  toCase,
  getConvention,
  type CaseConvention,
  type CaseConventionName,
} from './conventions.js';
export {
  buildCaseShapeMappings,
  recase,
  isCompoundWord,
  validateCompoundWord,
  type CaseShapeMapping,
  type CompoundWordField,
} from './mapping.js';

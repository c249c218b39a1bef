// Core data model
export type {
  Project,
  Table,
  Column,
  ColumnSettings,
  Index,
  IndexColumn,
  Ref,
  RefEndpoint,
  InlineRef,
  Enum,
  TableGroup,
  TableRef,
  RelType,
  RefAction,
} from './model';

export {
  DEFAULT_SCHEMA,
  RelTypes,
  RefActions,
  isRelType,
  isRefAction,
  qualifiedKey,
  createProject,
} from './model';

// Fluent construction
export type { Buildable } from './builder';
export {
  ProjectBuilder,
  TableBuilder,
  ColumnBuilder,
  IndexBuilder,
  RefBuilder,
  EnumBuilder,
  TableGroupBuilder,
  project,
  table,
  column,
  index,
  expressionIndex,
  ref,
  enumType,
  tableGroup,
} from './builder';

// Validation
export type { ValidationResult } from './validator';
export {
  ValidationError,
  validateProject,
  assertValidProject,
  validateTable,
  validateColumn,
  validateIndex,
  validateRef,
  validateRefEndpoint,
  validateInlineRef,
  validateEnum,
  validateTableGroup,
} from './validator';

// DBML generation
export {
  generateDbml,
  generateTable,
  generateColumn,
  generateIndex,
  generateRef,
  generateEnum,
  generateTableGroup,
  formatRefEndpoint,
  qualifyName,
  escapeString,
} from './generator';

// JSON / YAML documents
export type {
  DocumentFormat,
  ProjectDocument,
  TableDocument,
  ColumnDocument,
  IndexDocument,
  RefDocument,
  RefEndpointDocument,
  EnumDocument,
  TableGroupDocument,
} from './document';
export {
  DocumentError,
  projectDocumentSchema,
  projectFromDocument,
  projectToDocument,
  serializeProject,
  parseProject,
  formatFromPath,
} from './document';

// Schema extraction
export type { DbClient, ExtractOptions } from './schemaExtractor';
export { extractProject } from './schemaExtractor';

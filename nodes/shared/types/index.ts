/**
 * ============================================================================
 * TYPES PARTAGÉS - INDEX
 * ============================================================================
 *
 * import { TableData, DocxTablesResult } from '../shared/types';
 */

export * from './table.types';
export * from './extraction.types';

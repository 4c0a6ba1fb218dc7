/**
 * Text rendering.
 * @packageDocumentation
 */

export { renderTable, formatGrid } from './table'

/**
 * Pattern table.
 * @packageDocumentation
 */

export { Table, type TableOptions } from './table'

/**
 * Built-in service plugins
 * @module services/plugins
 */

export {
  createFormatValidator,
  createFormatValidators,
} from './format-validator.js'

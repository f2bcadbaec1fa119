/**
 * Templates Module
 */

export {
  type TemplateData,
  type TemplateRoot,
  type TemplateError,
  type CompiledTemplate,
  DEFAULT_SUMMARY_TEMPLATE,
  DEFAULT_DESCRIPTION_TEMPLATE,
  compileTemplate,
  formatAlerts,
  formatLabels,
  templateDataFor,
} from './template.js';

export {
  compileTemplate,
  EXTRA_ARGS_OFFSET,
  WELL_KNOWN_TOKENS,
  type TemplateSegment,
  type WellKnownToken,
} from './compile.js';
export { formatArguments, formatTemplate, renderTemplate } from './format.js';

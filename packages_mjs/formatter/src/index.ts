export {
    render,
    parse,
    matches,
    formatPartial,
    formatGlob,
    formatDefault,
    Formatter,
    type FormatterOptions
} from './formatter.js';
export { MODES, type Mode, type RenderOptions, loadEnvConfig, type EnvConfig } from './config.js';
export * from './errors.js';
export { clearTemplateCache, setTemplateCacheSize, templateCacheSize, getTemplate } from './cache.js';
export { compilePattern, matchTemplate, DEFAULT_CAPTURE, type CompiledPattern } from './reverse-matcher.js';
export { renderTemplate } from './renderer.js';
export { lookup, type Bindings, type Lookup } from './traversal.js';
export { formatValue, formatDefaultLiteral, type FormatResult } from './value-format.js';
export {
    parseTemplate,
    fieldKeys,
    ParseError,
    PartialFormatError,
    setLogLevel,
    getLogLevel,
    type Template,
    type FieldRef,
    type Segment,
    type ParseErrorKind
} from '@partial-format/syntax';

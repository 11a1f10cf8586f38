export { formatEvalDuration, formatFailure, renderResult } from './result.ts'
export { formatBytes, parseModelSize } from './size.ts'
export {
  extractCodeBlocks,
  formatDateTime,
  formatTimestamp,
  isValidServerUrl,
  sanitizeText,
  truncateText,
  type CodeBlock,
} from './text.ts'

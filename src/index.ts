export { analyzeOutput, parseAs, parseInput, buildMetrics, determineComplexity, estimateIndexTime } from './analyzer';
export { detectCommandType, hasErrorOutput, extractErrorMessages } from './commandDetector';
export { AnalysisFormatError, InputDecodeError, UsageError } from './errors';
export { parseDependencyLine, classifyVersion } from './parsers/dependencyLine';
export { parseShowDependencies } from './parsers/showDependencies';
export { parseDumpPackage, classifyUrl } from './parsers/dumpPackage';
export { parseResolve } from './parsers/resolve';
export { parseDescribe } from './parsers/describe';
export { parseUpdate } from './parsers/update';
export { buildSummary, deserializeAnalysis, isPackageAnalysis, renderOutput, serializeAnalysis } from './report';
export { filterIssues, isAtLeast, severityRank } from './utils';
export * from './types';

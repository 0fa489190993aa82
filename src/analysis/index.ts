export { analyzeRemoval, analyzeText } from './analyze';
export type { AnalyzeOptions, CodingReport, RemovalAnalysis, TextAnalysis } from './analyze';

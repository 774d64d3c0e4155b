export { parseHeader, validateHeaderConsistency, toStringRows } from './headerParser.js';
export { parseDailyFile, loadDailyFile, type ParsedDailyFile } from './dailyFileParser.js';

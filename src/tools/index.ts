/**
 * MCP Tools Module
 */

export { translateMessage, translateToolDef, toTranslateInput, type TranslateResult } from './translate.js';
export { parseMessage, parseToolDef, toParseInput, type ParseResult, type ParsedToken } from './parse.js';
export { encodeText, encodeToolDef, toEncodeInput, type EncodeResult } from './encode.js';
export { updateSession, sessionToolDef, toSessionInput, type SessionResult } from './session.js';

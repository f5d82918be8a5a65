export { DOC_RULES, checkDocs, checkReadmeText, checkSpecText } from './hygiene.js';

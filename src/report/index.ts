export { generateMarkdownReport, saveMarkdownReport, formatDateTime } from './markdown.js';

export { fetchPage, type FetchPageOptions } from './web-reader.js';
export { extractSiteSignals } from './site-extractor.js';

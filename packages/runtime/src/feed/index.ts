export { createFeedApi } from './api.js';
export { ServiceDirectory, publishFeed, connectToFeed } from './directory.js';

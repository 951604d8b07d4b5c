export { registerDocumentsRoutes } from './documents';
export { registerReviewRoutes } from './review';
export { registerAccuracyRoutes } from './accuracy';

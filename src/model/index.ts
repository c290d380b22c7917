export { createArticle, toArticles } from './article.js';
export type { Article, ArticleInput } from './article.js';
export { loadConfig, loadArticlesFile, parseWeightList, CONFIG_DIR, CONFIG_FILE } from './loader.js';

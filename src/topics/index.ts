/**
 * Topic module.
 *
 * A topic is raw text plus its normalized key. Everything that compares
 * topics (the tree's duplicate and cycle checks, the merger's seen memory,
 * tag filtering, archive tokens) goes through the normalizer here.
 *
 *   import { normalizeTopic } from "./topics/index.js";
 *
 *   normalizeTopic("Calvin  Cycle!");
 *   // => { key: "calvin cycle", display: "Calvin Cycle!" }
 */

export { TopicSchema, topicsEqual, type Topic } from "./schema.js";

export {
  normalizeTopic,
  tryNormalizeTopic,
  normalizeKey,
  normalizeTag,
  tokenize,
  formatTopic,
} from "./normalizer.js";

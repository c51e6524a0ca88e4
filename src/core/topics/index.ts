export {
  resolveTopicConfig,
  defaultTopicConfig,
  TOPIC_CONFIGS,
  type TopicConfig,
} from './topic-config';

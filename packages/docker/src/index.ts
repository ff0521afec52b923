/**
 * @dockwatch/docker
 *
 * Docker runtime adapter and workload descriptor extraction
 */

export {
  DockerRuntimeClient,
  createDockerClient,
  toWorkloadMetadata,
  type RuntimeClient,
  type DockerApi,
  type DockerClientOptions,
  type RuntimeClientOptions,
  type SubscribeOptions,
  type InspectedContainer,
} from './runtime-client';

export {
  decodeEvents,
  parseEventLine,
  toRawEvent,
  dockerEventSchema,
  type DockerEventMessage,
} from './event-stream';

export {
  extractDescriptor,
  extractDescriptors,
  stripImageTag,
  imageBasename,
  categoryFromLabels,
  resolveCategory,
  selectPublishedPort,
} from './descriptor';

export { DEFAULT_CATEGORY_MAP, extendCategoryMap, categoriesOf } from './categories';

export {
  SerializerConfiguration,
  loadConfiguration,
} from "./SerializerConfiguration.js";
export type { SerializerConfigurationInput } from "./SerializerConfiguration.js";

export { envSchema, parseEnv } from "./env.js";
export {
  SETTING_DEFINITIONS,
  destinationSettingKey,
  getSettingDefinition,
} from "./settings-catalog.js";

export {
  ChartConfigSchema,
  DEFAULT_CONFIG,
  ListConfigSchema,
  TextblockConfigSchema,
  type ChartConfig,
  type ListConfig,
  type TextblockConfig,
} from "./config";

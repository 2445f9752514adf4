export { config, configSchema, loadConfig, resetConfig, type Config } from "@invoice-dispatch/config";

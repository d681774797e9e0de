import { configureLogging } from "../services/logger.js";

configureLogging({ silent: true });

process.env.NODE_ENV = "test";
process.env.METRIC_STORE = "memory";
process.env.LOG_LEVEL = "error";
process.env.LOG_FILE = "false";

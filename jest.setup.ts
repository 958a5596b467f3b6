// Keep LangSmith tracing off so no test run reports to a remote project.
process.env.LANGCHAIN_TRACING_V2 = "false";
process.env.NODE_ENV = "test";

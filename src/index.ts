import { FastMCP } from "fastmcp";
import { allResources, allResourceTemplates } from "./resources/library.ts";
import {
  analyzeComplexityTool,
  computeCoefficientsTool,
  computeErrorTool,
  evaluateSeriesTool,
  recommendParametersTool,
} from "./tools/index.ts";

const server = new FastMCP({
  name: "Fourier Series MCP",
  version: "0.1.0",
});

// Register tools
server.addTool(computeCoefficientsTool);
server.addTool(evaluateSeriesTool);
server.addTool(computeErrorTool);
server.addTool(analyzeComplexityTool);
server.addTool(recommendParametersTool);

// Register resources
for (const resource of allResources) {
  server.addResource(resource);
}

for (const template of allResourceTemplates) {
  server.addResourceTemplate(template);
}

// Start server (stdio for local MCP agents)
await server.start({ transportType: "stdio" });

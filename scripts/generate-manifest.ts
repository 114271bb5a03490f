import { SERVICE_INFO } from "../src/app.js";
import { DEFAULT_SIMULATION_INPUT } from "../src/schema.js";

const manifest = {
  ...SERVICE_INFO,
  endpoints: [
    {
      key: "simulateTokenomics",
      description:
        "Run a monthly token economy projection with fee buyback, burn and depth-adjusted price impact",
      method: "POST",
      path: "/entrypoints/simulateTokenomics/invoke",
      inputExample: DEFAULT_SIMULATION_INPUT,
    },
  ],
};

console.log(JSON.stringify(manifest, null, 2));

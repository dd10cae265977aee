import { createNetwork, loadNetworkConfig } from "@roadnet/routing";
import { createApp } from "./app.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);
const CONFIG_NAME = process.env["NETWORK_CONFIG"] ?? "default";

const network = createNetwork(loadNetworkConfig(CONFIG_NAME));
const app = createApp(network);

app.listen(PORT, () => {
  console.log(`\nRoad network API server running at http://localhost:${PORT}`);
  console.log(`[network] Using network config "${CONFIG_NAME}"\n`);
});

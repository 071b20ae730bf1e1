import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = createApp({ config });

app.listen(config.port, () => {
  console.log(`[SOH Watch] Server running on http://localhost:${config.port}`);
  console.log(
    `[SOH Watch] Forecast columns end with '${config.forecastSuffix}', ${config.periodLengthDays} days per period`
  );
});

import { getAppConfig } from "./config/app-config.js";
import { createApp } from "./express-server.js";
import { createQueryContext } from "./query-context.js";
import { createHttpRemoteClient } from "./remote/http-remote-client.js";

const config = getAppConfig();
const remote = createHttpRemoteClient({
  baseUrl: config.remoteBaseUrl,
  apiKey: config.remoteApiKey,
  systemName: config.remoteSystemName,
});
const app = createApp(createQueryContext({ config, remote }));

app.listen(config.port, () => {
  console.log("[index:listen] server started", config.port);
});

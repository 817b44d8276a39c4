import { config } from "@config/env";
import { getHttpAdapterName } from "@lib/http/provider";
import { log } from "./utils/logger";
import { PetsView } from "./PetsView";

window.addEventListener("DOMContentLoaded", () => {
  const root = document.getElementById("app") ?? document.body;

  log.info("[ENV]", {
    mode: config.mode,
    HTTP_ADAPTER: getHttpAdapterName(),
    API_URL: config.apiBaseUrl,
  });

  PetsView(root).catch((error) => {
    log.error("pets view failed to mount", error);
  });
});

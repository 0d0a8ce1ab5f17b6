import type { Connector } from "./interface.js";
import type { ConnectorConfig } from "../config/types.js";
import { HanaConnector } from "./hana.js";
import { OdbcConnector } from "./odbc.js";

export function createConnector(config: ConnectorConfig): Connector {
  switch (config.type) {
    case "hana":
      return new HanaConnector(config);
    case "odbc":
      return new OdbcConnector(config);
  }
}

import { Backend } from "./backends.js";
import { RpcCadClient, type RpcCadClientOptions } from "./RpcCadClient.js";
import type { ICadClient } from "./types.js";

export class FreeCadClient extends RpcCadClient {
  readonly backend = Backend.FREECAD;
}

export class InventorClient extends RpcCadClient {
  readonly backend = Backend.INVENTOR;
}

export class SolidWorksClient extends RpcCadClient {
  readonly backend = Backend.SOLIDWORKS;
}

export class FusionClient extends RpcCadClient {
  readonly backend = Backend.FUSION;
}

export function createCadClient(backend: Backend, options: RpcCadClientOptions): ICadClient {
  switch (backend) {
    case Backend.FREECAD:
      return new FreeCadClient(options);
    case Backend.INVENTOR:
      return new InventorClient(options);
    case Backend.SOLIDWORKS:
      return new SolidWorksClient(options);
    case Backend.FUSION:
      return new FusionClient(options);
  }
}

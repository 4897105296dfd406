import initOpenCascade from "opencascade.js/dist/node.js";
import { OcctBackend, type OcctModule } from "../backend_occt.js";

export type BackendContext = { occt: OcctModule; backend: OcctBackend };

let backendContextPromise: Promise<BackendContext> | null = null;

export async function getBackendContext(): Promise<BackendContext> {
  if (!backendContextPromise) {
    backendContextPromise = (async () => {
      const occt = await initOpenCascade();
      return { occt, backend: new OcctBackend({ occt }) };
    })();
  }
  return backendContextPromise;
}

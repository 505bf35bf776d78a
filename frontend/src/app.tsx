import { useState } from "preact/hooks";
import type { RuntimeConfig } from "./config/runtimeConfig";
import { setRuntimeConfig } from "./config/runtimeConfig";
import { Banner } from "./components/Banner";
import { Layout } from "./components/Layout";
import { hydrateModels, modelStore } from "./core/models/modelStore";
import { ChatRoute } from "./routes/chat";

export function App(props: { runtimeConfig: RuntimeConfig; initialBootError?: string }) {
  setRuntimeConfig(props.runtimeConfig);
  const [bootError, setBootError] = useState<string | null>(props.initialBootError ?? null);
  const [bootRetrying, setBootRetrying] = useState(false);

  async function retryModels() {
    setBootRetrying(true);
    try {
      await hydrateModels();
      const { error } = modelStore.get();
      setBootError(error ? `Model list unavailable: ${error}` : null);
    } finally {
      setBootRetrying(false);
    }
  }

  return (
    <Layout
      title="Relay Chat"
      toolbar={
        bootError ? (
          <button class="btn" disabled={bootRetrying} onClick={() => void retryModels()}>
            {bootRetrying ? "Retrying..." : "Reload models"}
          </button>
        ) : null
      }
    >
      {bootError ? <Banner kind="info" text={bootError} onDismiss={() => setBootError(null)} /> : null}
      <ChatRoute />
    </Layout>
  );
}

import { render } from "preact";
import { App } from "./app";
import { errorMessage } from "./core/api/errors";
import { bootstrapApp } from "./core/boot/bootstrap";
import "./styles/base.css";

async function bootstrap() {
  const root = document.getElementById("app");
  if (!root) throw new Error("Missing #app");

  root.textContent = "Loading…";

  const boot = await bootstrapApp();
  render(<App runtimeConfig={boot.runtimeConfig} initialBootError={boot.bootError} />, root);
}

bootstrap().catch((err: unknown) => {
  const root = document.getElementById("app");
  if (!root) return;
  const pre = document.createElement("pre");
  pre.className = "pre";
  pre.textContent = errorMessage(err);
  const retry = document.createElement("button");
  retry.className = "btn primary";
  retry.textContent = "Retry";
  retry.onclick = () => location.reload();
  const heading = document.createElement("h1");
  heading.className = "h1";
  heading.textContent = "Relay Chat failed to start";
  root.replaceChildren(heading, pre, retry);
});

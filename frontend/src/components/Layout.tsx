import type { ComponentChildren } from "preact";
import { getRuntimeConfig } from "../config/runtimeConfig";

export function Layout(props: { title: string; toolbar?: ComponentChildren; children: ComponentChildren }) {
  const build = getRuntimeConfig().BUILD_INFO?.build_sha;

  return (
    <div class="shell">
      <main class="main">
        <div class="topbar">
          <div class="topbarTitle">{props.title}</div>
          <div class="topbarRight">{props.toolbar}</div>
        </div>

        <div class="content">{props.children}</div>

        {build ? <div class="footer muted mono">build {build.slice(0, 7)}</div> : null}
      </main>
    </div>
  );
}

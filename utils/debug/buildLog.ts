// Module-load breadcrumbs for slow cold starts; silent unless BUILD_DIAGNOSTICS=1.
export function buildLog(label: string) {
  if (process.env.BUILD_DIAGNOSTICS !== "1") {
    return;
  }

  console.log(`[build] ${new Date().toISOString()} - ${label}`);
}

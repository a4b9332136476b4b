// Test-only env scaffolding so the service-role client can be constructed offline.
// Route tests replace the client itself; these values never reach a real project.
if (!process.env.SUPABASE_URL) {
  process.env.SUPABASE_URL = "http://example.supabase.test";
}
if (!process.env.SUPABASE_SERVICE_ROLE_KEY) {
  process.env.SUPABASE_SERVICE_ROLE_KEY = "test-service-role-key";
}
delete process.env.APP_URL;
delete process.env.OFFERS_PAGE_SIZE;
delete process.env.MAX_PAGE_SIZE;

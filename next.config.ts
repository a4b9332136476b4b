import type { NextConfig } from "next";

import { buildLog } from "@/utils/debug/buildLog";

buildLog("next.config loaded");

const nextConfig: NextConfig = {
  trailingSlash: true,
};

export default nextConfig;

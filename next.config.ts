import type { NextConfig } from "next";

const securityHeaders = [
  { key: "X-Content-Type-Options", value: "nosniff" },
  { key: "Referrer-Policy", value: "strict-origin-when-cross-origin" },
];

const nextConfig: NextConfig = {
  async headers() {
    return [{ source: "/api/(.*)", headers: securityHeaders }];
  },
  async redirects() {
    return [
      {
        source: "/download.json",
        destination: "/api/movies/download",
        permanent: false,
      },
    ];
  },
};

export default nextConfig;

import type { Metadata } from "next";

export const metadata: Metadata = {
  title: {
    default: "GreenFleet — IT fleet lifecycle audit",
    template: "%s | GreenFleet",
  },
  description:
    "Keep, replace or refurbish: total cost of ownership, CO2 footprint and urgency for every device " +
    "in an IT fleet, with transition strategies, environmental ROI and cloud archival projections.",
  robots: { index: false, follow: false },
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en">
      <body style={{ fontFamily: "system-ui, sans-serif", margin: "0 auto", maxWidth: 960, padding: 24 }}>
        <main>{children}</main>
      </body>
    </html>
  );
}

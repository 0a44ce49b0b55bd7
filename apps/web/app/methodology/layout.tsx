import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Methodology — assumptions, sources and confidence",
  description:
    "Every assumption behind the GreenFleet estimates, with its source, confidence level and range.",
};

export default function MethodologyLayout({ children }: { children: React.ReactNode }) {
  return <>{children}</>;
}

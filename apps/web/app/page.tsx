import Link from "next/link";

const ENDPOINTS: Array<{ method: "GET" | "POST"; path: string; description: string }> = [
  { method: "GET", path: "/api/registry/reference", description: "Devices, personas, countries, strategies, business units" },
  { method: "POST", path: "/api/audit/device", description: "Keep / new / refurbished recommendation for one device" },
  { method: "POST", path: "/api/audit/fleet", description: "Fleet CSV or demo fleet → per-device analyses and summary" },
  { method: "POST", path: "/api/audit/fleet/export", description: "Fleet audit as CSV or PDF" },
  { method: "POST", path: "/api/roi", description: "Environmental ROI of extending equipment life" },
  { method: "POST", path: "/api/simulate", description: "Lifecycle optimizer weighted between cost and CO2" },
  { method: "POST", path: "/api/strategies", description: "Transition strategy comparison" },
  { method: "POST", path: "/api/cloud", description: "Cloud storage archival strategy" },
  { method: "GET", path: "/api/methodology", description: "Assumptions, methods, confidence levels, disclaimers" },
];

export default function HomePage() {
  return (
    <div>
      <h1>GreenFleet</h1>
      <p style={{ color: "#555", marginBottom: "16px" }}>
        Lifecycle decisions for IT equipment: cost of ownership, carbon footprint and replacement urgency.
        See the <Link href="/methodology">methodology</Link> for every assumption and source.
      </p>

      <table style={{ width: "100%", borderCollapse: "collapse", fontSize: "0.9rem" }}>
        <thead>
          <tr>
            <th align="left">Method</th>
            <th align="left">Endpoint</th>
            <th align="left">Description</th>
          </tr>
        </thead>
        <tbody>
          {ENDPOINTS.map(e => (
            <tr key={e.path} style={{ borderTop: "1px solid #e5e7eb" }}>
              <td style={{ fontWeight: 600, padding: "4px 8px 4px 0" }}>{e.method}</td>
              <td><code>{e.path}</code></td>
              <td>{e.description}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

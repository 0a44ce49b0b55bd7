import {
  CONFIDENCE_LEVELS,
  CONFIDENCE_VARIANCE,
  getAssumptions,
  getCalculationMethods,
} from "@/lib/methodology/methodology";
import { DISCLAIMERS } from "@/lib/methodology/disclaimers";

export default function MethodologyPage() {
  const assumptions = Object.entries(getAssumptions());
  const methods = Object.entries(getCalculationMethods());

  return (
    <div>
      <h1>Methodology</h1>
      <p style={{ fontSize: "0.85rem", color: "#555", marginBottom: "16px" }}>{DISCLAIMERS.general}</p>

      <h2>Confidence levels</h2>
      <ul>
        {CONFIDENCE_LEVELS.map(level => (
          <li key={level}>
            <strong>{level}</strong>: ±{Math.round(CONFIDENCE_VARIANCE[level] * 100)}%
          </li>
        ))}
      </ul>

      <h2>Assumptions</h2>
      <table style={{ width: "100%", borderCollapse: "collapse", fontSize: "0.85rem" }}>
        <thead>
          <tr>
            <th align="left">Assumption</th>
            <th align="right">Value</th>
            <th align="left">Confidence</th>
            <th align="left">Source</th>
          </tr>
        </thead>
        <tbody>
          {assumptions.map(([key, a]) => (
            <tr key={key} style={{ borderTop: "1px solid #e5e7eb" }}>
              <td>{a.name}</td>
              <td align="right">{a.value} {a.unit}</td>
              <td>{a.confidence}</td>
              <td>{a.sourceUrl ? <a href={a.sourceUrl}>{a.source}</a> : a.source}</td>
            </tr>
          ))}
        </tbody>
      </table>

      <h2>Calculation methods</h2>
      {methods.map(([key, m]) => (
        <section key={key}>
          <h3>{m.name}</h3>
          <p><code style={{ fontSize: "0.8rem", background: "#f3f4f6", padding: "2px 6px", borderRadius: 3 }}>{m.formula}</code></p>
          <p>{m.description}</p>
          <p style={{ fontSize: "0.8rem", color: "#555" }}>Confidence: {m.confidence} · {m.validationStatus}</p>
          <ul style={{ fontSize: "0.85rem", lineHeight: "1.7", paddingLeft: "20px" }}>
            {m.limitations.map(l => <li key={l}>{l}</li>)}
          </ul>
        </section>
      ))}

      <h2>Limitations</h2>
      {Object.entries(DISCLAIMERS).map(([key, text]) => (
        key === "general" ? null : <p key={key} style={{ fontSize: "0.85rem", color: "#555" }}>{text}</p>
      ))}
    </div>
  );
}

"use client";

import { useState } from "react";
import { parseMetricValue } from "@/lib/metricPrefix";

type FormState = {
  wavelength: string;
  power: string;
  duration: string;
};

const INITIAL_FORM: FormState = { wavelength: "450", power: "5u", duration: "100m" };

const inputStyle = { width: "100%", padding: 8, borderRadius: 8, border: "1px solid #ccc" };

export default function ExposurePage() {
  const [form, setForm] = useState<FormState>(INITIAL_FORM);
  const [report, setReport] = useState<string[]>([]);
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  async function onEvaluate() {
    setError(null);
    const power = parseMetricValue(form.power);
    if (!power.ok) return setError(`Power: ${power.error}`);
    const duration = parseMetricValue(form.duration);
    if (!duration.ok) return setError(`Duration: ${duration.error}`);

    setLoading(true);
    try {
      const res = await fetch("/api/exposure", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          wavelengthNm: Number(form.wavelength),
          powerW: power.value,
          durationS: duration.value,
        }),
      });
      const data: { error?: string; report?: string[] } = await res.json();
      if (!res.ok) throw new Error(data.error || "Request failed");
      setReport(data.report ?? []);
    } catch (e) {
      setReport([]);
      setError(e instanceof Error ? e.message : "Something went wrong");
    } finally {
      setLoading(false);
    }
  }

  const field = (key: keyof FormState, label: string, placeholder: string) => (
    <label style={{ display: "block", fontWeight: 600, marginBottom: 12 }}>
      {label}
      <input
        value={form[key]}
        onChange={(e) => setForm((prev) => ({ ...prev, [key]: e.target.value }))}
        placeholder={placeholder}
        style={inputStyle}
      />
    </label>
  );

  return (
    <main style={{ padding: 24, maxWidth: 720, margin: "0 auto" }}>
      <h1 style={{ fontSize: 24, fontWeight: 700, marginBottom: 12 }}>Small-Spot Exposure Calculator</h1>

      {field("wavelength", "Wavelength (nm, 400–500)", "450")}
      {field("power", "Power at pupil (W, e.g. 5u)", "5u")}
      {field("duration", "Exposure duration (s, e.g. 100m)", "100m")}

      <button
        onClick={() => void onEvaluate()}
        disabled={loading}
        style={{ padding: "10px 16px", borderRadius: 8, border: "1px solid #333", cursor: "pointer" }}
      >
        {loading ? "Evaluating..." : "Evaluate"}
      </button>

      {error && <p style={{ color: "crimson", marginTop: 12 }}>{error}</p>}

      {report.length > 0 && (
        <pre style={{ marginTop: 16, padding: 12, background: "#f6f6f6", borderRadius: 8 }}>{report.join("\n")}</pre>
      )}
    </main>
  );
}

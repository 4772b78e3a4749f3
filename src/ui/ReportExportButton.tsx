import { useState, type RefObject } from "react";
import { exportReport } from "../report/exportReport";
import { findChartSvg, rasterizeSvg } from "./rasterizeChart";

type Props = {
  holeGridRef: RefObject<HTMLDivElement>;
  fragmentationRef: RefObject<HTMLDivElement>;
  disabled?: boolean;
};

function chartSvg(ref: RefObject<HTMLDivElement>, which: string): SVGSVGElement {
  const svg = ref.current ? findChartSvg(ref.current) : null;
  if (!svg) throw new Error(`${which} chart is not rendered`);
  return svg;
}

function download(bytes: Uint8Array, mimeType: string, fileName: string): void {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  const url = URL.createObjectURL(new Blob([buffer], { type: mimeType }));
  const a = document.createElement("a");
  a.href = url;
  a.download = fileName;
  a.click();
  // revoked on the next tick so the browser has picked the download up
  setTimeout(() => URL.revokeObjectURL(url), 0);
}

export default function ReportExportButton({ holeGridRef, fragmentationRef, disabled }: Props) {
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string>("");

  async function onExport() {
    setBusy(true);
    setError("");
    try {
      const holeGrid = await rasterizeSvg(chartSvg(holeGridRef, "hole grid"));
      const fragmentation = await rasterizeSvg(chartSvg(fragmentationRef, "fragmentation"));
      const report = exportReport({ holeGrid, fragmentation });
      download(report.bytes, report.mimeType, report.fileName);
    } catch (e) {
      setError(e instanceof Error ? e.message : String(e));
      console.error(e);
    } finally {
      setBusy(false);
    }
  }

  return (
    <div style={{ display: "grid", gap: 6 }}>
      <h3 style={{ margin: 0 }}>Exportar Relatório em PDF</h3>
      <div>
        <button type="button" disabled={disabled || busy} onClick={() => void onExport()}>
          {busy ? "Gerando…" : "Gerar PDF"}
        </button>
      </div>
      {error ? (
        <div role="alert" style={{ color: "#b91c1c", fontSize: 13 }}>
          {error}
        </div>
      ) : null}
    </div>
  );
}

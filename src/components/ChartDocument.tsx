import type { ChartModel } from "@/lib/charts";
import { formatValue } from "@/lib/format";

const STYLES = `
body { margin: 0; background: #f4f4f5; color: #18181b; font-family: system-ui, -apple-system, "Segoe UI", sans-serif; }
main { max-width: 860px; margin: 32px auto; padding: 24px; background: #ffffff; border: 1px solid #e4e4e7; border-radius: 12px; }
h1 { margin: 0 0 4px; font-size: 20px; }
.meta { margin: 0 0 16px; color: #71717a; font-size: 13px; }
figure { margin: 0 0 24px; }
figure > svg { width: 100%; height: auto; }
.chart-marker { cursor: pointer; }
.chart-marker:hover { opacity: 0.6; }
table { width: 100%; border-collapse: collapse; font-size: 13px; }
th, td { padding: 6px 8px; border-bottom: 1px solid #e4e4e7; text-align: right; }
th:first-child, td:first-child { text-align: left; }
`;

interface ChartDocumentProps {
  model: ChartModel;
  svg: string;
}

export default function ChartDocument({ model, svg }: ChartDocumentProps) {
  const { config, recordset, series, points } = model;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{config.title}</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body>
        <main>
          <h1>{config.title}</h1>
          <p className="meta">
            iDigBio recordset {recordset} &middot; {points[0]?.bucket} to {points[points.length - 1]?.bucket}
          </p>
          <figure dangerouslySetInnerHTML={{ __html: svg }} />
          <table>
            <thead>
              <tr>
                <th>Date</th>
                {series.map((s) => (
                  <th key={s.key}>{s.label}</th>
                ))}
              </tr>
            </thead>
            <tbody>
              {points.map((p) => (
                <tr key={p.bucket}>
                  <td>{p.bucket}</td>
                  {series.map((s) => (
                    <td key={s.key}>{formatValue(p.values[s.key] ?? null)}</td>
                  ))}
                </tr>
              ))}
            </tbody>
          </table>
        </main>
      </body>
    </html>
  );
}

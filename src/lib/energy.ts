// src/lib/energy.ts
// Renewable-energy plant profile: fixed schema, KPIs and charts.
import type { ColumnClassification, ChartDecision, KpiDefinition } from "./types";

export const ENERGY_REQUIRED = ["Tecnologia", "Estado_Actual", "Capacidad_Instalada_MW", "Operador"] as const;

export const ENERGY_OPTIONAL = [
  "Eficiencia_Planta_Pct",
  "Inversion_Inicial_MUSD",
  "Generacion_Diaria_MWh",
  "Fecha_Entrada_Operacion",
] as const;

/** Sidebar multiselects, in display order. */
export const ENERGY_FILTER_COLUMNS = ["Tecnologia", "Estado_Actual"] as const;

export const ENERGY_KPIS: readonly KpiDefinition[] = [
  { key: "capacity", label: "Capacidad Total (MW)", aggregate: "sum", column: "Capacidad_Instalada_MW", format: "number" },
  { key: "efficiency", label: "Eficiencia Promedio", aggregate: "mean", column: "Eficiencia_Planta_Pct", format: "percent" },
  { key: "investment", label: "Inversión Total (MUSD)", aggregate: "sum", column: "Inversion_Inicial_MUSD", format: "currency" },
  { key: "plants", label: "Total Plantas", aggregate: "count", format: "integer" },
];

export function energyCharts(classification: ColumnClassification): ChartDecision[] {
  const kinds = classification.kinds;
  const charts: ChartDecision[] = [];

  if (kinds.Capacidad_Instalada_MW === "numeric") {
    charts.push({
      status: "chart",
      spec: { family: "groupedBar", x: "Operador", y: "Capacidad_Instalada_MW", color: "Tecnologia", title: "Capacidad Instalada por Operador (MW)" },
    });
  } else {
    charts.push({
      status: "unavailable",
      reason: "incompatible-types",
      message: "Capacidad_Instalada_MW no es numérica; no se puede graficar la capacidad por operador.",
    });
  }

  if (kinds.Inversion_Inicial_MUSD === "numeric" && kinds.Generacion_Diaria_MWh === "numeric") {
    charts.push({
      status: "chart",
      spec: {
        family: "scatter",
        x: "Inversion_Inicial_MUSD",
        y: "Generacion_Diaria_MWh",
        color: "Tecnologia",
        size: kinds.Capacidad_Instalada_MW === "numeric" ? "Capacidad_Instalada_MW" : undefined,
        title: "Relación Costo-Beneficio (Tamaño = Capacidad MW)",
      },
    });
  } else {
    charts.push({ status: "unavailable", reason: "missing-columns", message: "Faltan columnas para el gráfico de dispersión." });
  }

  charts.push({ status: "chart", spec: { family: "donut", names: "Estado_Actual", title: "Proporción por Estado del Proyecto" } });
  return charts;
}

// @vitest-environment jsdom
import { cleanup, render, screen } from "@testing-library/react";
import { afterEach, describe, expect, it } from "vitest";
import { tryEvaluate } from "../../engine/blastPlan";
import ResultsPanel from "../ResultsPanel";

const selection = {
  explosive: "ANFO",
  rockMass: "Rocha dura e altamente fraturada",
  pattern: "Aberta",
  benchHeightM: 10,
  holesPerRow: 5,
  rows: 4,
};

describe("ResultsPanel", () => {
  afterEach(() => {
    cleanup();
  });

  it("shows a hint before any evaluation", () => {
    render(<ResultsPanel outcome={null} />);
    expect(screen.getByText("Selecione os parâmetros para calcular o plano.")).toBeTruthy();
  });

  it("renders one tile per readout", () => {
    render(<ResultsPanel outcome={tryEvaluate(selection)} />);

    expect(screen.getByTestId("readout-spacingM").textContent).toBe("Espaçamento calculado5.29 m");
    expect(screen.getByTestId("readout-holeCount").textContent).toBe("Quantidade total de furos20");
    expect(screen.getByTestId("readout-x50Mm").textContent).toBe(
      "Tamanho médio estimado dos fragmentos (X50)959.0 mm"
    );
  });

  it("surfaces core errors with their code", () => {
    render(<ResultsPanel outcome={tryEvaluate({ ...selection, benchHeightM: 20 })} />);

    const alert = screen.getByRole("alert");
    expect(alert.getAttribute("data-code")).toBe("VALIDATION");
    expect(alert.textContent).toBe("benchHeightM must be between 2 and 15 m");
  });
});

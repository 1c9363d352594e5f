"use client";

import { useState, useEffect } from "react";
import { InputsView } from "@/components/InputsView";
import { ResultsView } from "@/components/ResultsView";
import { defaultForm } from "@/lib/default-inputs";
import { simulate, validateInputs, saveWidgetState, loadWidgetState } from "@/lib/mcp-client";
import type { PortfolioForm, ValidationResult, RunState } from "@/lib/types";
import { restoreWidgetState, toWidgetState, type View } from "@/lib/widget-state";

export default function PortfolioWidget() {
  const [currentView, setCurrentView] = useState<View>("inputs");
  const [form, setForm] = useState<PortfolioForm>(defaultForm);
  const [validationResult, setValidationResult] = useState<ValidationResult | null>(null);
  const [runState, setRunState] = useState<RunState>({ phase: "idle" });
  const [isLoading, setIsLoading] = useState(false);
  const [stateLoaded, setStateLoaded] = useState(false);

  // Restore persisted state from ChatGPT on mount
  useEffect(() => {
    const restored = restoreWidgetState(loadWidgetState(), defaultForm);
    setForm(restored.form);
    setCurrentView(restored.view);
    setRunState(restored.runState);
    setStateLoaded(true);
  }, []);

  useEffect(() => {
    if (!stateLoaded) return;
    saveWidgetState(toWidgetState(form, currentView, runState));
  }, [form, currentView, runState, stateLoaded]);

  const handleValidate = async () => {
    setIsLoading(true);
    setValidationResult(null);

    try {
      setValidationResult(await validateInputs(form));
    } catch (error) {
      setValidationResult({
        status: "invalid",
        errors: [{ path: "/", message: String(error) }],
      });
    } finally {
      setIsLoading(false);
    }
  };

  const handleRun = async () => {
    setIsLoading(true);
    setValidationResult(null);
    setRunState({ phase: "running" });
    setCurrentView("results");

    try {
      const result = await simulate(form);
      if (result.status === "invalid") {
        setRunState({ phase: "failed", error: "Inputs rejected", errors: result.errors });
      } else {
        setRunState({ phase: "complete", simulation: result });
      }
    } catch (error) {
      setRunState({ phase: "failed", error: String(error), errors: [] });
    } finally {
      setIsLoading(false);
    }
  };

  const handleEditInputs = () => {
    setRunState({ phase: "idle" });
    setCurrentView("inputs");
  };

  return (
    <main>
      {currentView === "inputs" && (
        <InputsView
          form={form}
          onFormChange={setForm}
          onValidate={handleValidate}
          onRun={handleRun}
          validationResult={validationResult}
          isLoading={isLoading}
        />
      )}

      {currentView === "results" && <ResultsView runState={runState} onRunAgain={handleEditInputs} />}
    </main>
  );
}

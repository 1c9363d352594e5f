"use client";

import { useState } from "react";
import { MAX_BUILDINGS } from "@portfolio-sim/engine/config";
import { createBuilding, resizeBuildings } from "@/lib/default-inputs";
import { BUILDING_FIELD_GROUPS } from "@/lib/fields";
import type { BuildingField } from "@portfolio-sim/engine";
import type { BuildingInput, OccupancyModel, PortfolioForm, ValidationResult } from "@/lib/types";

interface Props {
  form: PortfolioForm;
  onFormChange: (form: PortfolioForm) => void;
  onValidate: () => Promise<void>;
  onRun: () => Promise<void>;
  validationResult: ValidationResult | null;
  isLoading: boolean;
}

export function InputsView({ form, onFormChange, onValidate, onRun, validationResult, isLoading }: Props) {
  const [expandedBuilding, setExpandedBuilding] = useState<number | null>(0);
  const { buildings } = form;

  const setBuildings = (next: BuildingInput[]) => onFormChange({ ...form, buildings: next });

  const updateBuilding = (index: number, patch: Partial<BuildingInput>) => {
    setBuildings(buildings.map((b, i) => (i === index ? { ...b, ...patch } : b)));
  };

  const updateNumber = (index: number, key: BuildingField, raw: number) => {
    const value = Number.isNaN(raw) ? 0 : raw;
    setBuildings(buildings.map((b, i) => (i === index ? { ...b, [key]: value } : b)));
  };

  const addBuilding = () => {
    if (buildings.length >= MAX_BUILDINGS) return;
    setBuildings([...buildings, createBuilding(buildings.length)]);
    setExpandedBuilding(buildings.length);
  };

  const removeBuilding = (index: number) => {
    if (buildings.length <= 1) return;
    setBuildings(buildings.filter((_, i) => i !== index));
    setExpandedBuilding(null);
  };

  const toggleBuilding = (index: number) => {
    setExpandedBuilding(expandedBuilding === index ? null : index);
  };

  return (
    <div className="inputs-view">
      <h2>Office Portfolio Inputs</h2>

      {validationResult && validationResult.status === "invalid" && (
        <div className="validation-errors">
          <h4>Validation Errors:</h4>
          <ul>
            {validationResult.errors.map((err, i) => (
              <li key={i}>
                <strong>{err.path}:</strong> {err.message}
              </li>
            ))}
          </ul>
        </div>
      )}

      {validationResult && validationResult.status === "ok" && (
        <div className="validation-success">Inputs validated successfully</div>
      )}

      <section className="input-section">
        <div className="section-content">
          <div className="form-row-group">
            <div className="form-row">
              <label>Number of buildings</label>
              <input
                type="number"
                min={1}
                max={MAX_BUILDINGS}
                step={1}
                value={buildings.length}
                onChange={(e) => {
                  const count = e.target.valueAsNumber;
                  if (!Number.isNaN(count)) setBuildings(resizeBuildings(buildings, count));
                }}
              />
            </div>
            <div className="form-row">
              <label>Occupancy model</label>
              <select
                value={form.occupancyModel}
                onChange={(e) => {
                  const model: OccupancyModel = e.target.value === "linear" ? "linear" : "logistic";
                  onFormChange({ ...form, occupancyModel: model });
                }}
              >
                <option value="logistic">Logistic (saturating)</option>
                <option value="linear">Linear (clamped)</option>
              </select>
            </div>
          </div>
        </div>
      </section>

      {buildings.map((building, idx) => (
        <section key={idx} className="input-section">
          <h3 onClick={() => toggleBuilding(idx)} className="section-header">
            {building.name || `Building ${idx + 1}`} {expandedBuilding === idx ? "▼" : "▶"}
          </h3>
          {expandedBuilding === idx && (
            <div className="section-content">
              <div className="form-row">
                <label>Name</label>
                <input
                  type="text"
                  value={building.name}
                  onChange={(e) => updateBuilding(idx, { name: e.target.value })}
                />
              </div>

              {BUILDING_FIELD_GROUPS.map((group) => (
                <fieldset key={group.title} className="field-group">
                  <legend>{group.title}</legend>
                  <div className="form-row-group">
                    {group.fields.map((field) => (
                      <div key={field.key} className="form-row">
                        <label>{field.label}</label>
                        <input
                          type="number"
                          min={field.min}
                          max={field.max}
                          step={field.step}
                          value={building[field.key]}
                          onChange={(e) => updateNumber(idx, field.key, e.target.valueAsNumber)}
                        />
                      </div>
                    ))}
                  </div>
                </fieldset>
              ))}

              <button
                type="button"
                className="btn-delete"
                onClick={() => removeBuilding(idx)}
                disabled={buildings.length <= 1}
              >
                Remove building
              </button>
            </div>
          )}
        </section>
      ))}

      <button type="button" className="btn-add" onClick={addBuilding} disabled={buildings.length >= MAX_BUILDINGS}>
        + Add Building
      </button>

      {/* Action Buttons */}
      <div className="action-buttons">
        <button type="button" className="btn btn-secondary" onClick={onValidate} disabled={isLoading}>
          {isLoading ? "..." : "Validate"}
        </button>
        <button type="button" className="btn btn-primary" onClick={onRun} disabled={isLoading}>
          {isLoading ? "Running..." : "Run Simulation"}
        </button>
      </div>
    </div>
  );
}

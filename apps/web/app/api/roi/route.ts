/**
 * POST /api/roi
 *
 * Environmental ROI of extending equipment life.
 *
 * Single row:
 *   { "equipment_type": "Laptop", "annual_salary": 50000, "mfg_kgco2e": 250 }
 *   (mfg_kgco2e defaults to the equipment_carbon table)
 *
 * Inventory:
 *   { "inventory_csv": "...", "carbon_factors_csv": "..." }
 *   (carbon_factors_csv may be a poste/valeur export or an
 *    equipment_type/mfg_kgco2e table; defaults to the equipment_carbon table)
 *
 * Optional: "carbon_price" (€/tCO2e, default from config)
 */

import { NextRequest, NextResponse } from "next/server";
import { computeEnvironmentalRoi, computeRoi } from "@/lib/roi/environmental-roi";
import { parseRoiInventory } from "@/lib/roi/inventory-loader";
import { parseCarbonFactorCsv, referenceCarbonFactors } from "@/lib/roi/carbon-factor-loader";
import { getConfig } from "@/lib/config";
import { getAuditLogger } from "@/lib/audit-trail";
import { errorResponse, recordAudit } from "@/lib/api/route-errors";
import {
  optionalNumber,
  readJsonBody,
  requireNumber,
  requireString,
  RequestValidationError,
} from "@/lib/api/request-validation";

const ROUTE = "/api/roi";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const carbonPrice = optionalNumber(body, "carbon_price", getConfig().carbonPriceEurPerTonne, { min: 0 });
    const audit = getAuditLogger();

    const inventoryCsv = body.inventory_csv;
    if (typeof inventoryCsv === "string") {
      const inventory = parseRoiInventory(inventoryCsv);
      if (inventory.length === 0) {
        throw new RequestValidationError("Inventory CSV has no Inventory rows");
      }
      const factorsCsv = body.carbon_factors_csv;
      const factors = typeof factorsCsv === "string" ? parseCarbonFactorCsv(factorsCsv) : referenceCarbonFactors();
      const report = computeEnvironmentalRoi(inventory, factors, carbonPrice);

      for (const w of report.warnings) console.warn(`[roi] ${w}`);
      recordAudit(ROUTE, () => audit.logCalculation(
        "environmental_roi",
        { rows: inventory.length, carbon_price: carbonPrice },
        { total_net_roi_eur: report.totalNetRoiEur, unmatched: report.warnings.length },
      ));
      return NextResponse.json(report);
    }

    const equipmentType = requireString(body, "equipment_type").trim();
    const annualSalary = requireNumber(body, "annual_salary", { min: 0 });
    const tableValue = referenceCarbonFactors()[equipmentType];
    const mfg = optionalNumber(body, "mfg_kgco2e", tableValue ?? -1, { min: 0 });
    if (mfg < 0) {
      throw new RequestValidationError(`No carbon factor for equipment type "${equipmentType}"; pass mfg_kgco2e`);
    }

    const result = computeRoi({ equipmentType, annualSalary }, mfg, carbonPrice);
    recordAudit(ROUTE, () => audit.logCalculation(
      "environmental_roi",
      { equipment_type: equipmentType, annual_salary: annualSalary, mfg_kgco2e: mfg, carbon_price: carbonPrice },
      { net_roi_eur: result.netRoiEur },
    ));
    return NextResponse.json(result);
  } catch (e) {
    return errorResponse(ROUTE, e);
  }
}

export { renderFleetReportPdf } from "./fleet_report_pdf";
export type {
  FleetReportInput,
  FleetReportPdf,
  ReportDeviceRow,
  ReportSummary,
  ReportUnitSummary,
} from "./types";

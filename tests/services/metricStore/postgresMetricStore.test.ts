import { describe, expect, it } from "@jest/globals";
import {
  mapAgentRow,
  mapAssignmentRow,
} from "../../../src/services/metricStore/postgresMetricStore.service";

describe("PostgresMetricStore row mapping", () => {
  it("converts NUMERIC ratings and fills a missing department", () => {
    expect(
      mapAgentRow({
        agent_id: 12,
        name: "Lena Ortiz",
        average_customer_service_rating: "4.25",
        department_name: null,
        years_of_service: 7,
      }),
    ).toEqual({
      agentId: 12,
      name: "Lena Ortiz",
      averageCustomerServiceRating: 4.25,
      departmentName: "",
      yearsOfService: 7,
    });
  });

  it("maps a left-joined assignment without a booking to a null booking", () => {
    expect(
      mapAssignmentRow({
        assignment_id: 55,
        agent_id: 12,
        lead_source: "Bought",
        communication_method: "Text",
        booking_id: null,
        destination: null,
        booking_status: null,
      }),
    ).toEqual({
      assignmentId: 55,
      agentId: 12,
      leadSource: "Bought",
      communicationMethod: "Text",
      booking: null,
    });
  });

  it("maps the linked booking when present", () => {
    expect(
      mapAssignmentRow({
        assignment_id: 56,
        agent_id: 12,
        lead_source: "Organic",
        communication_method: "Phone Call",
        booking_id: 301,
        destination: "Titan",
        booking_status: "Cancelled",
      }).booking,
    ).toEqual({ bookingId: 301, destination: "Titan", bookingStatus: "Cancelled" });
  });
});

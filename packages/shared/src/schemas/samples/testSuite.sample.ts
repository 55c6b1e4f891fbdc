import type { TestSuite } from "../testSuite";
import { SUITE_SCHEMA_VERSION } from "../../constants";

export const testSuiteSample: TestSuite = {
  schemaVersion: SUITE_SCHEMA_VERSION,
  generatedAt: "2026-02-26T00:00:00.000Z",
  featureName: "Login",
  sourceRequirementCount: 2,

  requirements: [
    { id: "1", text: "User can log in with valid credentials." },
    { id: "2", text: "User sees error on invalid password." },
  ],

  analysis: {
    risks: ["Repeated failed logins may need a lockout that no requirement describes"],
    assumptions: ["Users sign in with email and password only"],
  },

  cases: [
    {
      id: "TC-001",
      requirementId: "1",
      title: "Log in with a registered account",
      category: "functional",
      priority: "high",
      preconditions: ["A registered account exists"],
      steps: ["Open the login page", "Enter a valid email and password", "Submit the form"],
      expectedResult: "The dashboard is shown",
      tags: ["auth", "happy-path"],
    },
    {
      id: "TC-002",
      requirementId: "2",
      title: "Reject a wrong password",
      category: "negative",
      priority: "medium",
      preconditions: [],
      steps: ["Open the login page", "Enter a valid email and a wrong password", "Submit the form"],
      expectedResult: "An \"Invalid password\" error is shown, and the user stays on the login page",
      tags: ["auth"],
    },
  ],
};

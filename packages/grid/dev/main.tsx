import React from "react";
import ReactDOM from "react-dom/client";
import { WeeklyActivityDemo } from "../src/dev";

const container = document.getElementById("root");
if (!container) {
  throw new Error("Dev demo expects a #root element.");
}

ReactDOM.createRoot(container).render(
  <React.StrictMode>
    <WeeklyActivityDemo />
  </React.StrictMode>
);

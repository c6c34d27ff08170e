import { StrictMode } from "react";
import { createRoot } from "react-dom/client";
import App from "./App";
import { QuestionBank } from "./questionBank";
import { UAE_HISTORY } from "./questions";

const root = document.getElementById("root");
if (!root) throw new Error("Missing #root element.");

createRoot(root).render(
  <StrictMode>
    <App bank={QuestionBank.fromCatalog(UAE_HISTORY)} />
  </StrictMode>
);

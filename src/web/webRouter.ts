import express from "express";
import path from "path";
import { readFileSync } from "fs";
import swaggerUi from "swagger-ui-express";

const __dirname = path.join(process.cwd(), "src", "web");

const router = express.Router();

// API Documentation with Swagger UI
const swaggerDocument = JSON.parse(readFileSync(path.join(__dirname, "swagger.json"), "utf8"));

const swaggerOptions = {
  customCss: `
    .swagger-ui .topbar { display: none }
  `,
  customSiteTitle: "Neighborhood Checker API Documentation",
  swaggerOptions: {
    docExpansion: "none",
    defaultModelsExpandDepth: 1,
    tryItOutEnabled: true,
  },
};

router.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument, swaggerOptions));

router.get("/", (_req, res) => {
  res.redirect("/docs");
});

export default { router };

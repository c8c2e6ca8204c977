import fetch from "node-fetch";
import { HttpGet } from "./types";

export const httpGet: HttpGet = (url, headers = {}) => fetch(url, { headers });

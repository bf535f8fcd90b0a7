export { PlyMeshKeypointStore, cadBaseName, parseKeypointYaml, toMeshData } from "./PlyMeshKeypointStore";
export { NormalSketchRenderer, normalColor, rasterizeNormals } from "./NormalSketchRenderer";

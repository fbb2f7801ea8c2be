export interface XmlElement {
	name: string;
	text?: string;
	children: XmlElement[];
}

/** A built document and the file name it is written under */
export interface OutputDocument {
	fileName: string;
	root: XmlElement;
}

/**
 * Tesseroid
 *
 * A spherical prism bounded by two meridians, two parallels and two radial
 * surfaces, with uniform physical properties. Bounds are degrees for
 * west/east/south/north and metres (positive up, relative to sea level) for
 * top/bottom.
 */

export interface TesseroidProps {
    density: number;    // kg/m3
    vp: number;         // m/s
    vs: number;         // m/s
}

export class Tesseroid {
    readonly west: number;
    readonly east: number;
    readonly south: number;
    readonly north: number;
    readonly top: number;
    readonly bottom: number;
    readonly props: Readonly<TesseroidProps>;

    constructor(
        west: number,
        east: number,
        south: number,
        north: number,
        top: number,
        bottom: number,
        props: TesseroidProps
    ) {
        this.west = west;
        this.east = east;
        this.south = south;
        this.north = north;
        this.top = top;
        this.bottom = bottom;
        this.props = Object.freeze({ ...props });
        Object.freeze(this);
    }

    /** Vertical extent in metres. */
    get thickness(): number {
        return this.top - this.bottom;
    }

    /** [west, east, south, north, top, bottom] */
    get bounds(): [number, number, number, number, number, number] {
        return [this.west, this.east, this.south, this.north, this.top, this.bottom];
    }
}
